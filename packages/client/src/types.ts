/**
 * API request/response types for the Stopwise server.
 *
 * These mirror the server's models. Domain shapes (plans, points) come from
 * @stopwise/types.
 */

import type { LabeledPoint, RoutePlan } from "@stopwise/types";

// ---------------------------------------------------------------------------
// Points
// ---------------------------------------------------------------------------

export interface CoordinateInput {
  lat: number;
  lng: number;
  label?: string;
}

export interface AddressInput {
  address: string;
  label?: string;
}

/** A stop or depot, as coordinates or as text to geocode */
export type PointInput = CoordinateInput | AddressInput;

// ---------------------------------------------------------------------------
// Route optimization
// ---------------------------------------------------------------------------

export interface PlanningOverrides {
  /** Stops per navigation link, 2-25 */
  chunkSize?: number;
  /** Start each link at the previous link's destination */
  connectLegs?: boolean;
}

export interface OptimizeRouteRequest {
  depot: PointInput;
  stops: PointInput[];
  options?: PlanningOverrides;
}

export type OptimizeRouteResponse = RoutePlan;

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export interface SessionRouteRequest {
  stops: PointInput[];
  options?: PlanningOverrides;
}

export interface DepotResponse {
  userId: string;
  depot: LabeledPoint;
  /** ISO 8601 */
  updatedAt: string;
}

export interface ChatMessageRequest {
  text?: string;
  location?: { lat: number; lng: number };
}

export interface ChatReplyResponse {
  reply: string;
  plan?: RoutePlan;
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  /** Users with a stored depot */
  sessions: number;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
