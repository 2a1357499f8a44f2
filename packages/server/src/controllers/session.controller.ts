import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import {
  chatMessageBodySchema,
  sessionRouteBodySchema,
  setDepotBodySchema,
  userIdSchema,
} from "../models/requests.js";
import type { ChatReplyResponse, DepotResponse, OptimizeRouteResponse } from "../models/responses.js";
import type { ConversationService } from "../services/conversation.service.js";
import {
  DepotNotSetError,
  type DepotStore,
  type StoredDepot,
} from "../services/depot-store.service.js";
import {
  DEPOT_LABEL,
  type RouteOptimizationService,
} from "../services/route-optimization.service.js";

type UserParams = { userId: string };

function toDepotResponse(entry: StoredDepot): DepotResponse {
  return { userId: entry.userId, depot: entry.depot, updatedAt: entry.updatedAt.toISOString() };
}

export function createSessionRouter(
  depots: DepotStore,
  routes: RouteOptimizationService,
  conversation: ConversationService,
): Router {
  const router = Router();

  /** GET /api/sessions/:userId/depot */
  router.get(
    "/:userId/depot",
    async (req: Request<UserParams>, res: Response<DepotResponse>, next: NextFunction) => {
      try {
        const userId = userIdSchema.parse(req.params.userId);
        const entry = await depots.get(userId);
        if (!entry) throw new DepotNotSetError(userId);
        res.json(toDepotResponse(entry));
      } catch (err) {
        next(err);
      }
    },
  );

  /** PUT /api/sessions/:userId/depot: body is an address or coordinates; overwrites */
  router.put(
    "/:userId/depot",
    async (req: Request<UserParams>, res: Response<DepotResponse>, next: NextFunction) => {
      try {
        const userId = userIdSchema.parse(req.params.userId);
        const input = setDepotBodySchema.parse(req.body);
        const depot = await routes.resolvePoint(input, DEPOT_LABEL);
        const entry = await depots.set(userId, depot);
        console.log(`[sessions] Depot set for ${userId}`);
        res.json(toDepotResponse(entry));
      } catch (err) {
        next(err);
      }
    },
  );

  /** DELETE /api/sessions/:userId/depot */
  router.delete(
    "/:userId/depot",
    async (req: Request<UserParams>, res: Response, next: NextFunction) => {
      try {
        const userId = userIdSchema.parse(req.params.userId);
        if (!(await depots.delete(userId))) throw new DepotNotSetError(userId);
        res.status(204).end();
      } catch (err) {
        next(err);
      }
    },
  );

  /** POST /api/sessions/:userId/route: plan stops from the stored depot */
  router.post(
    "/:userId/route",
    async (req: Request<UserParams>, res: Response<OptimizeRouteResponse>, next: NextFunction) => {
      try {
        const userId = userIdSchema.parse(req.params.userId);
        const body = sessionRouteBodySchema.parse(req.body);
        const entry = await depots.get(userId);
        if (!entry) throw new DepotNotSetError(userId);
        const stops = await routes.resolveStops(body.stops);
        res.json(routes.plan(entry.depot, stops, body.options));
      } catch (err) {
        next(err);
      }
    },
  );

  /** POST /api/sessions/:userId/messages: chat-style commands and stop lists */
  router.post(
    "/:userId/messages",
    async (req: Request<UserParams>, res: Response<ChatReplyResponse>, next: NextFunction) => {
      try {
        const userId = userIdSchema.parse(req.params.userId);
        const message = chatMessageBodySchema.parse(req.body);
        res.json(await conversation.handle(userId, message));
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
