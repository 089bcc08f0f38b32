/**
 * User profile routes
 */

import { Router } from "express";
import {
  applyReferralValidation,
  createUserHandlers,
  getUserValidation,
  updateUserValidation,
} from "../controllers/userController";
import { requireUser } from "../middleware/auth";
import { Services } from "../services";

export function userRoutes(services: Services): Router {
  const router = Router();
  const handlers = createUserHandlers(services.users);

  // Every profile route needs a caller id; ownership is checked per handler
  router.use(requireUser);

  // GET /api/users/:id - Profile, created on first read
  router.get("/:id", getUserValidation, handlers.getUserHandler);

  // PUT /api/users/:id - Update profile
  router.put("/:id", updateUserValidation, handlers.updateUserHandler);

  // POST /api/users/:id/referral - Redeem someone's referral code
  router.post(
    "/:id/referral",
    applyReferralValidation,
    handlers.applyReferralHandler,
  );

  return router;
}
