import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { HealthResponse } from "../models/responses.js";
import type { DepotStore } from "../services/depot-store.service.js";

export function createHealthRouter(depots: DepotStore): Router {
  const router = Router();

  /** GET /health: liveness plus the number of active depot sessions */
  router.get("/", async (_req: Request, res: Response<HealthResponse>, next: NextFunction) => {
    try {
      res.json({ status: "ok", uptime: process.uptime(), sessions: await depots.size() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
