/**
 * Route optimization service: geocoding + planning.
 *
 * Resolves request points to coordinates (addresses go through the
 * geocoder, coordinates pass through) and runs the planning pipeline.
 */

import type { LabeledPoint, RoutePlan } from "@stopwise/types";
import type { AddressResolver } from "@stopwise/geocoding";
import {
  DEFAULT_MAX_STOPS,
  TooManyStopsError,
  planRoute,
  type PlanRouteOptions,
} from "@stopwise/routing";
import type { PlanningOverrides, PointInput } from "../models/requests.js";

export const DEPOT_LABEL = "Depot";

export class RouteOptimizationService {
  constructor(
    private readonly geocoder: AddressResolver,
    private readonly planning: PlanRouteOptions = {},
  ) {}

  /**
   * Turn a request point into a labeled coordinate.
   *
   * Addresses are labeled with their own text unless a label is given;
   * coordinates fall back to `fallbackLabel`, then to "lat,lng".
   */
  async resolvePoint(input: PointInput, fallbackLabel?: string): Promise<LabeledPoint> {
    if ("address" in input) {
      const coordinate = await this.geocoder.geocode(input.address);
      return { coordinate, label: input.label ?? fallbackLabel ?? input.address };
    }
    const coordinate = { lat: input.lat, lng: input.lng };
    return { coordinate, label: input.label ?? fallbackLabel ?? `${input.lat},${input.lng}` };
  }

  /**
   * Throw before any geocoding when a request carries more stops than the
   * configured limit.
   * @throws TooManyStopsError
   */
  checkStopCount(count: number): void {
    const maxStops = this.planning.maxStops ?? DEFAULT_MAX_STOPS;
    if (count > maxStops) {
      throw new TooManyStopsError(count, maxStops);
    }
  }

  /** Resolve stops one at a time, in input order, so provider requests never overlap. */
  async resolveStops(stops: readonly PointInput[]): Promise<LabeledPoint[]> {
    this.checkStopCount(stops.length);
    const resolved: LabeledPoint[] = [];
    for (const stop of stops) {
      resolved.push(await this.resolvePoint(stop));
    }
    return resolved;
  }

  /** Geocode where needed and plan the route */
  async optimize(
    depotInput: PointInput,
    stopInputs: readonly PointInput[],
    overrides: PlanningOverrides = {},
  ): Promise<RoutePlan> {
    this.checkStopCount(stopInputs.length);
    const depot = await this.resolvePoint(depotInput, DEPOT_LABEL);
    const stops = await this.resolveStops(stopInputs);
    return this.plan(depot, stops, overrides);
  }

  /** Plan over already-resolved points */
  plan(
    depot: LabeledPoint,
    stops: readonly LabeledPoint[],
    overrides: PlanningOverrides = {},
  ): RoutePlan {
    const start = Date.now();
    const plan = planRoute(depot, stops, {
      ...this.planning,
      chunkSize: overrides.chunkSize ?? this.planning.chunkSize,
      connectLegs: overrides.connectLegs ?? this.planning.connectLegs,
    });
    console.log(
      `[routes] Planned ${stops.length} stops in ${Date.now() - start}ms: ` +
        `${plan.totalDistanceKm.toFixed(1)} km, ${plan.legs.length} legs, ` +
        `${plan.improvement.movesApplied} 2-opt moves` +
        (plan.improvement.converged ? "" : " (stopped by budget)"),
    );
    return plan;
  }
}
