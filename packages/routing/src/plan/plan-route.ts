/**
 * Route planning pipeline.
 *
 * 1. Depot + stops -> point set (depot at index 0)
 * 2. Nearest-neighbor construction from the depot
 * 3. 2-opt improvement (optionally budgeted)
 * 4. Partition the ordered coordinates into navigation legs
 */

import type { LabeledPoint, NavigationLeg, PlannedStop, RoutePlan } from "@stopwise/types";
import { routeLengthKm } from "../distance/index.js";
import { TooManyStopsError } from "../errors.js";
import { DEFAULT_CHUNK_SIZE, partitionLinks, renderGoogleMapsUrl } from "../links/index.js";
import { constructTour, improveTourWithStats, type TwoOptOptions } from "../tour/index.js";

/** Default cap on stops per request, keeping 2-opt latency bounded */
export const DEFAULT_MAX_STOPS = 200;

/** Options for {@link planRoute} */
export interface PlanRouteOptions {
  /** Maximum points per navigation leg (default 10) */
  chunkSize?: number;
  /** Start each leg at the previous leg's destination (default false) */
  connectLegs?: boolean;
  /** Maximum number of stops, depot excluded (default 200) */
  maxStops?: number;
  /** Budget for the improvement step */
  twoOpt?: TwoOptOptions;
}

/**
 * Order stops from a depot and build the navigation legs that cover them.
 *
 * @param depot - Starting point; always first in the plan
 * @param stops - Stops to visit, in any order
 * @param options - Planning options
 * @throws TooManyStopsError if there are more stops than `maxStops`
 */
export function planRoute(
  depot: LabeledPoint,
  stops: readonly LabeledPoint[],
  options: PlanRouteOptions = {},
): RoutePlan {
  const maxStops = options.maxStops ?? DEFAULT_MAX_STOPS;
  if (stops.length > maxStops) {
    throw new TooManyStopsError(stops.length, maxStops);
  }

  const labeled = [depot, ...stops];
  const points = labeled.map((p) => p.coordinate);

  const initial = constructTour(points, 0);
  const { tour, ...improvement } = improveTourWithStats(initial, points, options.twoOpt);

  const stopList: PlannedStop[] = tour.map((pointIndex, i) => {
    const point = labeled[pointIndex]!;
    return {
      position: i + 1,
      pointIndex,
      label: point.label,
      coordinate: point.coordinate,
    };
  });

  const ordered = stopList.map((s) => s.coordinate);
  const legs: NavigationLeg[] = partitionLinks(
    ordered,
    options.chunkSize ?? DEFAULT_CHUNK_SIZE,
    { connectLegs: options.connectLegs ?? false },
  ).map((descriptor, i) => ({
    ...descriptor,
    index: i + 1,
    url: renderGoogleMapsUrl(descriptor),
  }));

  return {
    tour,
    stops: stopList,
    legs,
    totalDistanceKm: routeLengthKm(tour, points),
    improvement,
  };
}
