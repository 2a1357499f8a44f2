import express from "express";
import cors from "cors";
import morgan from "morgan";
import type { AddressResolver } from "@stopwise/geocoding";
import type { PlanRouteOptions } from "@stopwise/routing";
import { createHealthRouter } from "./controllers/health.controller.js";
import { createRouteRouter } from "./controllers/route.controller.js";
import { createSessionRouter } from "./controllers/session.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { ConversationService } from "./services/conversation.service.js";
import type { DepotStore } from "./services/depot-store.service.js";
import { RouteOptimizationService } from "./services/route-optimization.service.js";

export interface AppDependencies {
  geocoder: AddressResolver;
  depots: DepotStore;
  planning?: PlanRouteOptions;
  /** Log each request with morgan (default: true) */
  requestLogging?: boolean;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const routes = new RouteOptimizationService(deps.geocoder, deps.planning);
  const conversation = new ConversationService(deps.geocoder, deps.depots, routes);

  // Middleware
  app.use(cors());
  if (deps.requestLogging ?? true) {
    app.use(morgan("dev"));
  }
  app.use(express.json({ limit: "1mb" }));

  // Routes
  app.use("/health", createHealthRouter(deps.depots));
  app.use("/api/routes", createRouteRouter(routes));
  app.use("/api/sessions", createSessionRouter(deps.depots, routes, conversation));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
