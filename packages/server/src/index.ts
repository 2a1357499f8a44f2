/**
 * @stopwise/server
 *
 * HTTP front end: route optimization, per-user depot sessions and a
 * chat-style endpoint that replies with the ordered stops and map links.
 */

export { createApp, type AppDependencies } from "./app.js";
export { loadConfig, type AppConfig } from "./config.js";
export {
  InMemoryDepotStore,
  DepotNotSetError,
  type DepotStore,
  type StoredDepot,
} from "./services/depot-store.service.js";
export { RouteOptimizationService } from "./services/route-optimization.service.js";
export { ConversationService, formatRouteReply } from "./services/conversation.service.js";
export type * from "./models/responses.js";
export type {
  PointInput,
  PlanningOverrides,
  OptimizeRouteRequest,
  SessionRouteRequest,
  ChatMessageRequest,
} from "./models/requests.js";
