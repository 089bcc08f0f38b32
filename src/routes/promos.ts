import { Router } from "express";
import {
  applyPromoValidation,
  createPromoHandlers,
  createPromoValidation,
} from "../controllers/promoController";
import { requireAdmin, requireUser } from "../middleware/auth";
import { Services } from "../services";

export function promoRoutes(services: Services): Router {
  const router = Router();
  const handlers = createPromoHandlers(services.promos);

  // GET /api/promos (admin only)
  router.get("/", requireAdmin, handlers.listPromosHandler);

  // POST /api/promos (admin only)
  router.post(
    "/",
    requireAdmin,
    createPromoValidation,
    handlers.createPromoHandler,
  );

  // POST /api/promos/apply - Redeem a code at checkout
  router.post(
    "/apply",
    requireUser,
    applyPromoValidation,
    handlers.applyPromoHandler,
  );

  return router;
}
