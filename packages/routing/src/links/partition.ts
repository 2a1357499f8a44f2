/**
 * Split an ordered point list into bounded-size navigation requests.
 *
 * Map providers cap how many stops one directions request may carry, so a
 * long route is handed out as consecutive legs of at most `chunkSize`
 * stops each.
 */

import type { Coordinate, NavigationDescriptor } from "@stopwise/types";

/** Default number of stops per leg (origin + waypoints + destination) */
export const DEFAULT_CHUNK_SIZE = 10;

/** Options for link partitioning */
export interface PartitionOptions {
  /**
   * Start every leg after the first at the previous leg's destination, so
   * the legs chain into one continuous route (default: false).
   */
  connectLegs?: boolean;
}

/**
 * Partition an ordered point list into navigation descriptors.
 *
 * The input is cut into `ceil(n / chunkSize)` contiguous, non-overlapping
 * chunks. Each chunk becomes one descriptor: first point is the origin,
 * last point the destination, everything in between the waypoints. A chunk
 * with a single point yields origin === destination and no waypoints.
 *
 * @param points - Coordinates in visiting order
 * @param chunkSize - Maximum input points per descriptor (default 10)
 * @param options - Partition options
 * @returns Descriptors in chunk order
 * @throws RangeError if `chunkSize` is not a positive integer
 */
export function partitionLinks(
  points: readonly Coordinate[],
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  options: PartitionOptions = {},
): NavigationDescriptor[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be an integer >= 1, got ${chunkSize}`);
  }

  const descriptors: NavigationDescriptor[] = [];
  let previous: NavigationDescriptor | undefined;

  for (let start = 0; start < points.length; start += chunkSize) {
    const chunk = points.slice(start, start + chunkSize);
    if (options.connectLegs && previous) {
      chunk.unshift(previous.destination);
    }
    const descriptor = toDescriptor(chunk);
    descriptors.push(descriptor);
    previous = descriptor;
  }

  return descriptors;
}

function toDescriptor(chunk: Coordinate[]): NavigationDescriptor {
  const origin = chunk[0];
  const destination = chunk[chunk.length - 1];
  if (!origin || !destination) {
    throw new RangeError("Cannot build a navigation descriptor from an empty chunk");
  }
  return {
    origin,
    destination,
    waypoints: chunk.length > 2 ? chunk.slice(1, -1) : [],
  };
}
