/**
 * Promo code controller
 */

import { Request, Response } from "express";
import { body, matchedData, validationResult } from "express-validator";
import { CreatePromoInput } from "../models/promo";
import { PromoService } from "../services/promoService";
import { errorMeta, logger } from "../services/logger";
import { sendFailure } from "./outcome";

export const createPromoValidation = [
  body("code")
    .isString()
    .trim()
    .matches(/^[A-Za-z0-9_-]{1,32}$/)
    .withMessage("Code must be 1-32 letters, digits, underscores or hyphens"),
  body("discount")
    .isInt({ min: 1, max: 100 })
    .withMessage("Discount must be a percentage between 1 and 100")
    .toInt(),
  body("uses")
    .isInt({ min: 1 })
    .withMessage("Uses must be a positive integer")
    .toInt(),
];

/**
 * POST /api/promos/apply
 * userId defaults to the caller
 */
export const applyPromoValidation = [
  body("code").isString().trim().notEmpty().withMessage("Code is required"),
  body("userId").optional().isInt({ min: 1 }).toInt(),
];

export function createPromoHandlers(promos: PromoService) {
  async function listPromosHandler(req: Request, res: Response): Promise<void> {
    try {
      res.json(await promos.list());
    } catch (err) {
      logger.error("Failed to list promos", errorMeta(err));
      res.status(500).json({ error: "Failed to list promos" });
    }
  }

  async function createPromoHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    try {
      const input: CreatePromoInput = matchedData(req, { locations: ["body"] });
      const outcome = await promos.create(input);
      if (!outcome.success) {
        sendFailure(res, outcome);
        return;
      }
      res.status(201).json({ success: true, promo: outcome.promo });
    } catch (err) {
      logger.error("Failed to create promo", errorMeta(err));
      res.status(500).json({ error: "Failed to create promo" });
    }
  }

  async function applyPromoHandler(req: Request, res: Response): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const input: { code: string; userId?: number } = matchedData(req, {
      locations: ["body"],
    });
    const userId = input.userId ?? req.userId;
    if (userId === undefined) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    try {
      const outcome = await promos.apply(input.code, userId);
      if (!outcome.success) {
        sendFailure(res, outcome);
        return;
      }
      res.json({
        success: true,
        discount: outcome.discount,
        used: outcome.used,
      });
    } catch (err) {
      logger.error("Failed to apply promo", {
        ...errorMeta(err),
        code: input.code,
      });
      res.status(500).json({ error: "Failed to apply promo" });
    }
  }

  return { listPromosHandler, createPromoHandler, applyPromoHandler };
}
