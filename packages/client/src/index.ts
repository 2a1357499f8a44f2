// Base
export { ApiError, BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

// Domain clients
export { RouteClient } from "./routeClient.js";
export { SessionClient } from "./sessionClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Points
  CoordinateInput,
  AddressInput,
  PointInput,
  // Routes
  PlanningOverrides,
  OptimizeRouteRequest,
  OptimizeRouteResponse,
  // Sessions
  SessionRouteRequest,
  DepotResponse,
  ChatMessageRequest,
  ChatReplyResponse,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
