/** Thrown when no geocoder could resolve an address. */
export class AddressNotFoundError extends Error {
  readonly status = 404;

  constructor(readonly address: string) {
    super(`Address not found: ${address}`);
    this.name = "AddressNotFoundError";
  }
}

/** Thrown when a provider answers with an error status. */
export class GeocoderResponseError extends Error {
  readonly status = 502;

  constructor(
    readonly provider: string,
    readonly providerStatus: string,
    detail?: string,
  ) {
    super(`${provider} geocoder returned ${providerStatus}${detail ? `: ${detail}` : ""}`);
    this.name = "GeocoderResponseError";
  }
}
