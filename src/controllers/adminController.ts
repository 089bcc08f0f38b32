/**
 * Admin tools controller
 */

import { Request, Response } from "express";
import { body, matchedData, validationResult } from "express-validator";
import { BroadcastService } from "../services/broadcastService";
import { errorMeta, logger } from "../services/logger";

export const broadcastValidation = [
  body("message")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("Message is required")
    .isLength({ max: 4096 })
    .withMessage("Message must be at most 4096 characters"),
];

export function createAdminHandlers(broadcasts: BroadcastService) {
  /**
   * POST /api/admin/broadcast
   */
  async function broadcastHandler(req: Request, res: Response): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const { message }: { message: string } = matchedData(req, {
      locations: ["body"],
    });

    try {
      const result = await broadcasts.broadcast(message, req.userId ?? 0);
      res.json({ success: true, recipients: result.recipients });
    } catch (err) {
      logger.error("Failed to send broadcast", errorMeta(err));
      res.status(500).json({ error: "Failed to send broadcast" });
    }
  }

  return { broadcastHandler };
}
