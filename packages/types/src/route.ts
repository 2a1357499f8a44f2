/**
 * Route planning results - the output of the routing engine.
 *
 * A plan is a visiting order over the request's point set plus the
 * navigation legs that cover that order.
 */

import type { Coordinate } from "./geo.js";

/**
 * A visiting order: a permutation of indices into a PointSet.
 * The depot (index 0) comes first.
 */
export type Tour = readonly number[];

/** One bounded-size routable request: origin -> waypoints -> destination */
export interface NavigationDescriptor {
  origin: Coordinate;
  destination: Coordinate;
  /** Intermediate stops in visiting order (possibly empty) */
  waypoints: Coordinate[];
}

/** A navigation descriptor rendered for the end user */
export interface NavigationLeg extends NavigationDescriptor {
  /** 1-based leg number */
  index: number;
  /** Directions URL for the leg */
  url: string;
}

/** One row of the ordered stop list */
export interface PlannedStop {
  /** 1-based position in the visiting order (the depot is 1) */
  position: number;
  /** Index into the request's point set */
  pointIndex: number;
  label: string;
  coordinate: Coordinate;
}

/** Statistics from the 2-opt improvement step */
export interface ImprovementStats {
  /** Number of full passes started */
  passes: number;
  /** Number of improving reversals applied */
  movesApplied: number;
  /** False when a pass or time budget cut the search short */
  converged: boolean;
  /** Length of the nearest-neighbor tour in kilometers */
  initialLengthKm: number;
  /** Length of the improved tour in kilometers */
  finalLengthKm: number;
}

/** A complete route plan */
export interface RoutePlan {
  tour: Tour;
  /** Stops in visiting order, depot first */
  stops: PlannedStop[];
  /** Navigation legs covering the stops in order */
  legs: NavigationLeg[];
  /** Open-path length (no return to depot) in kilometers */
  totalDistanceKm: number;
  improvement: ImprovementStats;
}
