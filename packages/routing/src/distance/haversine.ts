/**
 * Great-circle distance on a spherical earth.
 */

import type { Coordinate, PointSet, Tour } from "@stopwise/types";

/** Mean Earth radius in kilometers */
export const EARTH_RADIUS_KM = 6371.0;

const TO_RAD = Math.PI / 180;

/**
 * Haversine distance between two coordinates in kilometers.
 *
 * Symmetric and zero for identical inputs. Coordinates are not range-checked.
 */
export function haversineDistanceKm(a: Coordinate, b: Coordinate): number {
  const phi1 = a.lat * TO_RAD;
  const phi2 = b.lat * TO_RAD;
  const sinHalfLat = Math.sin(((b.lat - a.lat) * TO_RAD) / 2);
  const sinHalfLng = Math.sin(((b.lng - a.lng) * TO_RAD) / 2);
  const h =
    sinHalfLat * sinHalfLat +
    Math.cos(phi1) * Math.cos(phi2) * sinHalfLng * sinHalfLng;
  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Total length of a tour in kilometers.
 *
 * Open path: the depot is a fixed start and there is no return leg.
 */
export function routeLengthKm(tour: Tour, points: PointSet): number {
  let total = 0;
  for (let i = 0; i + 1 < tour.length; i++) {
    total += haversineDistanceKm(pointAt(points, tour[i]), pointAt(points, tour[i + 1]));
  }
  return total;
}

/**
 * Look up a tour entry in its point set.
 * @throws RangeError if the index does not address a point
 */
export function pointAt(points: PointSet, index: number | undefined): Coordinate {
  const point = index === undefined ? undefined : points[index];
  if (!point) {
    throw new RangeError(`Tour index ${String(index)} is outside the point set (size ${points.length})`);
  }
  return point;
}
