import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { optimizeRouteBodySchema } from "../models/requests.js";
import type { OptimizeRouteResponse } from "../models/responses.js";
import type { RouteOptimizationService } from "../services/route-optimization.service.js";

export function createRouteRouter(routes: RouteOptimizationService): Router {
  const router = Router();

  /** POST /api/routes/optimize: order stops from a depot and build navigation legs */
  router.post(
    "/optimize",
    async (req: Request, res: Response<OptimizeRouteResponse>, next: NextFunction) => {
      try {
        const body = optimizeRouteBodySchema.parse(req.body);
        res.json(await routes.optimize(body.depot, body.stops, body.options));
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
