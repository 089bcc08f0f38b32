import { Router } from "express";
import { createStatsHandlers } from "../controllers/statsController";
import { requireAdmin } from "../middleware/auth";
import { Services } from "../services";

export function statsRoutes(services: Services): Router {
  const router = Router();
  const handlers = createStatsHandlers(services.stats);

  // GET /api/stats (admin only)
  router.get("/", requireAdmin, handlers.getStatsHandler);

  return router;
}
