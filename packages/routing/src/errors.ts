/** Thrown when a point set or start index cannot seed a tour. */
export class InvalidPointSetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPointSetError";
  }
}

/** Thrown when a request carries more stops than the configured limit. */
export class TooManyStopsError extends Error {
  readonly status = 422;

  constructor(
    readonly stopCount: number,
    readonly maxStops: number,
  ) {
    super(`Too many stops: ${stopCount} (limit ${maxStops})`);
    this.name = "TooManyStopsError";
  }
}
