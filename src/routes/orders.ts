/**
 * Order routes
 */

import { Router } from "express";
import {
  createOrderHandlers,
  createOrderValidation,
  listUserOrdersValidation,
  updateOrderStatusValidation,
} from "../controllers/orderController";
import { requireAdmin, requireUser } from "../middleware/auth";
import { Services } from "../services";

export function orderRoutes(services: Services): Router {
  const router = Router();
  const handlers = createOrderHandlers(services.orders);

  // GET /api/orders - All orders (admin only)
  router.get("/", requireAdmin, handlers.listOrdersHandler);

  // POST /api/orders - Checkout
  router.post(
    "/",
    requireUser,
    createOrderValidation,
    handlers.createOrderHandler,
  );

  // GET /api/orders/user/:userId - Orders of one user (owner or admin)
  router.get(
    "/user/:userId",
    requireUser,
    listUserOrdersValidation,
    handlers.listUserOrdersHandler,
  );

  // PATCH /api/orders/:id/status - Change status (owner or admin)
  router.patch(
    "/:id/status",
    requireUser,
    updateOrderStatusValidation,
    handlers.updateOrderStatusHandler,
  );

  return router;
}
