import type { LabeledPoint, RoutePlan } from "@stopwise/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  sessions: number;
}

export interface DepotResponse {
  userId: string;
  depot: LabeledPoint;
  updatedAt: string;
}

export type OptimizeRouteResponse = RoutePlan;

export interface ChatReplyResponse {
  reply: string;
  /** Present when the message produced a route */
  plan?: RoutePlan;
}

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
