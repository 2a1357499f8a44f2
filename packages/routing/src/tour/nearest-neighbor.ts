/**
 * Nearest-neighbor tour construction.
 *
 * Greedy: from the current point, always extend to the closest point
 * not yet placed. O(n²), which is fine for a courier's stop list.
 */

import type { PointSet, Tour } from "@stopwise/types";
import { haversineDistanceKm, pointAt } from "../distance/index.js";
import { InvalidPointSetError } from "../errors.js";

/**
 * Build an initial visiting order over a point set.
 *
 * Ties are broken by the lowest index: candidates are scanned in ascending
 * order and only a strictly shorter distance replaces the current best.
 *
 * @param points - Coordinates, depot at index 0
 * @param startIndex - Index the tour starts from (default 0, the depot)
 * @returns A permutation of all indices beginning with `startIndex`
 */
export function constructTour(points: PointSet, startIndex = 0): Tour {
  if (points.length === 0) {
    throw new InvalidPointSetError("Cannot build a tour over an empty point set");
  }
  if (!Number.isInteger(startIndex) || startIndex < 0 || startIndex >= points.length) {
    throw new InvalidPointSetError(
      `Start index ${startIndex} is outside the point set (size ${points.length})`,
    );
  }

  const placed = new Array<boolean>(points.length).fill(false);
  const tour: number[] = [startIndex];
  placed[startIndex] = true;

  let current = pointAt(points, startIndex);
  while (tour.length < points.length) {
    let nextIndex = -1;
    let nextDistance = Infinity;
    for (let i = 0; i < points.length; i++) {
      if (placed[i]) continue;
      const d = haversineDistanceKm(current, pointAt(points, i));
      if (nextIndex === -1 || d < nextDistance) {
        nextIndex = i;
        nextDistance = d;
      }
    }
    tour.push(nextIndex);
    placed[nextIndex] = true;
    current = pointAt(points, nextIndex);
  }

  return tour;
}
