import { Router } from "express";
import {
  broadcastValidation,
  createAdminHandlers,
} from "../controllers/adminController";
import { requireAdmin } from "../middleware/auth";
import { Services } from "../services";

export function adminRoutes(services: Services): Router {
  const router = Router();
  const handlers = createAdminHandlers(services.broadcasts);

  router.use(requireAdmin);

  // POST /api/admin/broadcast - Log a message to every user
  router.post("/broadcast", broadcastValidation, handlers.broadcastHandler);

  return router;
}
