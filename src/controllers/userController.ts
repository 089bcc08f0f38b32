/**
 * User profile controller
 */

import { Request, Response } from "express";
import {
  body,
  matchedData,
  param,
  query,
  validationResult,
} from "express-validator";
import { isOwnerOrAdmin } from "../middleware/auth";
import { UpdateUserInput } from "../models/user";
import { UserService } from "../services/userService";
import { errorMeta, logger } from "../services/logger";
import { sendFailure } from "./outcome";

/**
 * GET /api/users/:id
 * Reading an unknown id creates the profile
 */
export const getUserValidation = [
  param("id").isInt({ min: 1 }).withMessage("Valid user ID is required"),
  query("username").optional().isString().trim().isLength({ max: 100 }),
];

export const updateUserValidation = [
  param("id").isInt({ min: 1 }).withMessage("Valid user ID is required"),
  body("username").optional().isString().trim().isLength({ max: 100 }),
  body("bonus")
    .optional()
    .isInt({ min: 0 })
    .withMessage("Bonus must be a non-negative integer")
    .toInt(),
];

export const applyReferralValidation = [
  param("id").isInt({ min: 1 }).withMessage("Valid user ID is required"),
  body("code")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("Referral code is required"),
];

export function createUserHandlers(users: UserService) {
  async function getUserHandler(req: Request, res: Response): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const id = parseInt(req.params.id, 10);
    if (!isOwnerOrAdmin(req, id)) {
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    try {
      const { username }: { username?: string } = matchedData(req, {
        locations: ["query"],
      });
      res.json(await users.getOrCreate(id, username));
    } catch (err) {
      logger.error("Failed to get user", { ...errorMeta(err), userId: id });
      res.status(500).json({ error: "Failed to get user" });
    }
  }

  async function updateUserHandler(req: Request, res: Response): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const id = parseInt(req.params.id, 10);
    if (!isOwnerOrAdmin(req, id)) {
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    const input: UpdateUserInput = matchedData(req, { locations: ["body"] });
    if (input.bonus !== undefined && !req.isAdmin) {
      res.status(403).json({ error: "Only admins can change bonus" });
      return;
    }

    try {
      const user = await users.getOrCreate(id);
      const saved = await users.save({
        ...user,
        username: input.username ?? user.username,
        bonus: input.bonus ?? user.bonus,
      });
      res.json({ success: true, user: saved });
    } catch (err) {
      logger.error("Failed to update user", { ...errorMeta(err), userId: id });
      res.status(500).json({ error: "Failed to update user" });
    }
  }

  async function applyReferralHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const id = parseInt(req.params.id, 10);
    if (req.userId !== id) {
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    const { code }: { code: string } = matchedData(req, {
      locations: ["body"],
    });

    try {
      await users.getOrCreate(id);
      const outcome = await users.applyReferral(id, code);
      if (!outcome.success) {
        sendFailure(res, outcome);
        return;
      }
      res.json({ success: true, referrerId: outcome.referrer.id });
    } catch (err) {
      logger.error("Failed to apply referral", {
        ...errorMeta(err),
        userId: id,
      });
      res.status(500).json({ error: "Failed to apply referral" });
    }
  }

  return { getUserHandler, updateUserHandler, applyReferralHandler };
}
