/**
 * Google Maps directions URLs for navigation descriptors.
 *
 * Uses the documented `https://www.google.com/maps/dir/?api=1` form, which
 * opens turn-by-turn directions on phones without an API key.
 */

import type { Coordinate, NavigationDescriptor } from "@stopwise/types";
import { DEFAULT_CHUNK_SIZE, partitionLinks, type PartitionOptions } from "./partition.js";

export const GOOGLE_MAPS_DIRECTIONS_BASE = "https://www.google.com/maps/dir/?api=1";

/** "lat,lng" exactly as the numbers print, no rounding */
export function formatCoordinate(c: Coordinate): string {
  return `${c.lat},${c.lng}`;
}

/**
 * Render a descriptor as a directions URL.
 *
 * The `waypoints` parameter is left out when the leg has none. Separators
 * are kept literal (`,` and `|`) as the Maps URL documentation shows them.
 */
export function renderGoogleMapsUrl(descriptor: NavigationDescriptor): string {
  let url =
    `${GOOGLE_MAPS_DIRECTIONS_BASE}` +
    `&origin=${formatCoordinate(descriptor.origin)}` +
    `&destination=${formatCoordinate(descriptor.destination)}`;
  if (descriptor.waypoints.length > 0) {
    url += `&waypoints=${descriptor.waypoints.map(formatCoordinate).join("|")}`;
  }
  return url;
}

/**
 * Partition an ordered point list and render one URL per leg.
 */
export function buildMapsLinks(
  points: readonly Coordinate[],
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  options?: PartitionOptions,
): string[] {
  return partitionLinks(points, chunkSize, options).map(renderGoogleMapsUrl);
}
