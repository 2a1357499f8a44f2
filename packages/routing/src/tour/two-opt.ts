/**
 * 2-opt local search over an open path.
 *
 * Each pass scans every segment reversal that leaves position 0 (the
 * depot) in place. An improving reversal is applied the moment it is found
 * and later candidates in the same pass are measured against the updated
 * tour (first improvement, not best-of-pass). Passes repeat until one
 * applies nothing, or until the caller's budget runs out.
 *
 * A candidate is accepted only when its full route length, summed leg by
 * leg from the depot, is strictly below the current best. Scoring by the
 * two changed edges alone picks different moves when points coincide, so
 * totals are always summed in full; leg distances are cached per pair.
 * Reversals cover positions i..j-1 with j <= n-1, so the last stop never
 * moves.
 */

import type { ImprovementStats, PointSet, Tour } from "@stopwise/types";
import { haversineDistanceKm, pointAt, routeLengthKm } from "../distance/index.js";

/** Budget for the improvement search */
export interface TwoOptOptions {
  /** Stop after this many passes (default: unbounded) */
  maxPasses?: number;
  /** Stop once this many milliseconds have elapsed (default: unbounded) */
  timeLimitMs?: number;
  /** Clock used for the time limit (default: Date.now) */
  now?: () => number;
}

/** Improved tour plus search statistics */
export interface TwoOptResult extends ImprovementStats {
  tour: Tour;
}

/**
 * Improve a tour with 2-opt and report how the search went.
 *
 * The returned tour is never longer than the input and starts with the
 * same element. The input array is not modified.
 */
export function improveTourWithStats(
  tour: Tour,
  points: PointSet,
  options: TwoOptOptions = {},
): TwoOptResult {
  const best = [...tour];
  const n = best.length;
  const initialLengthKm = routeLengthKm(best, points);

  const now = options.now ?? Date.now;
  const maxPasses = options.maxPasses ?? Infinity;
  const deadline =
    options.timeLimitMs === undefined ? Infinity : now() + options.timeLimitMs;

  const legKm = legDistanceCache(points);

  /** Length of `best` with positions i..j-1 reversed */
  const candidateLengthKm = (i: number, j: number): number => {
    let total = 0;
    let prev = best[0]!;
    for (let p = 1; p < n; p++) {
      const next = p >= i && p < j ? best[i + j - 1 - p]! : best[p]!;
      total += legKm(prev, next);
      prev = next;
    }
    return total;
  };

  let bestLengthKm = initialLengthKm;
  let passes = 0;
  let movesApplied = 0;
  let improved = true;
  let exhausted = false;

  while (improved && !exhausted) {
    if (passes >= maxPasses) {
      exhausted = true;
      break;
    }
    passes++;
    improved = false;

    for (let i = 1; i <= n - 3 && !exhausted; i++) {
      for (let j = i + 2; j <= n - 1; j++) {
        if (deadline !== Infinity && now() >= deadline) {
          exhausted = true;
          break;
        }
        const lengthKm = candidateLengthKm(i, j);
        if (lengthKm < bestLengthKm) {
          reverseRange(best, i, j - 1);
          bestLengthKm = lengthKm;
          movesApplied++;
          improved = true;
        }
      }
    }
  }

  return {
    tour: best,
    passes,
    movesApplied,
    converged: !exhausted,
    initialLengthKm,
    finalLengthKm: bestLengthKm,
  };
}

/**
 * Improve a tour with 2-opt.
 *
 * @param tour - Visiting order, depot first
 * @param points - Point set the tour indexes into
 * @param options - Optional pass/time budget
 * @returns A tour no longer than `tour`, with the same first element
 */
export function improveTour(tour: Tour, points: PointSet, options?: TwoOptOptions): Tour {
  return improveTourWithStats(tour, points, options).tour;
}

/** Haversine distance between two point-set indices, computed once per ordered pair */
function legDistanceCache(points: PointSet): (from: number, to: number) => number {
  const size = points.length;
  const cache = new Float64Array(size * size).fill(Number.NaN);
  return (from, to) => {
    const key = from * size + to;
    let km = cache[key]!;
    if (Number.isNaN(km)) {
      km = haversineDistanceKm(pointAt(points, from), pointAt(points, to));
      cache[key] = km;
    }
    return km;
  };
}

/** Reverse `arr[from..to]` in place (inclusive bounds). */
function reverseRange<T>(arr: T[], from: number, to: number): void {
  for (let lo = from, hi = to; lo < hi; lo++, hi--) {
    const tmp = arr[lo]!;
    arr[lo] = arr[hi]!;
    arr[hi] = tmp;
  }
}
