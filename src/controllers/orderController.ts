/**
 * Order controller
 */

import { Request, Response } from "express";
import { body, matchedData, param, validationResult } from "express-validator";
import { isOwnerOrAdmin } from "../middleware/auth";
import { OrderItem } from "../models/order";
import { OrderService } from "../services/orderService";
import { errorMeta, logger } from "../services/logger";

/**
 * POST /api/orders
 * userId defaults to the caller
 */
export const createOrderValidation = [
  body("userId")
    .optional()
    .isInt({ min: 1 })
    .withMessage("userId must be a positive integer")
    .toInt(),
  body("items")
    .isArray({ min: 1 })
    .withMessage("Order must contain at least one item"),
  body("items.*.productId").isInt({ min: 1 }).toInt(),
  body("items.*.name").optional().isString(),
  body("items.*.quantity").isInt({ min: 1 }).toInt(),
  body("items.*.price").isInt({ min: 0 }).toInt(),
  body("total")
    .isInt({ min: 0 })
    .withMessage("Total must be a non-negative integer")
    .toInt(),
  body("status").optional().isString().trim().notEmpty(),
];

export const listUserOrdersValidation = [
  param("userId").isInt({ min: 1 }).withMessage("Valid user ID is required"),
];

export const updateOrderStatusValidation = [
  param("id").isInt({ min: 1 }).withMessage("Valid order ID is required"),
  body("status")
    .isString()
    .trim()
    .notEmpty()
    .withMessage("Status is required")
    .isLength({ max: 32 }),
];

interface CreateOrderBody {
  userId?: number;
  items: OrderItem[];
  total: number;
  status?: string;
}

export function createOrderHandlers(orders: OrderService) {
  async function listOrdersHandler(req: Request, res: Response): Promise<void> {
    try {
      res.json(await orders.list());
    } catch (err) {
      logger.error("Failed to list orders", errorMeta(err));
      res.status(500).json({ error: "Failed to list orders" });
    }
  }

  async function createOrderHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const input: CreateOrderBody = matchedData(req, { locations: ["body"] });
    const userId = input.userId ?? req.userId;

    if (userId === undefined) {
      res.status(401).json({ error: "Authentication required" });
      return;
    }

    if (!isOwnerOrAdmin(req, userId)) {
      res.status(403).json({ error: "Cannot place orders for another user" });
      return;
    }

    try {
      const order = await orders.save({
        userId,
        items: input.items,
        total: input.total,
        status: input.status,
      });
      res.status(201).json({ success: true, order });
    } catch (err) {
      logger.error("Failed to create order", { ...errorMeta(err), userId });
      res.status(500).json({ error: "Failed to create order" });
    }
  }

  async function listUserOrdersHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const userId = parseInt(req.params.userId, 10);
    if (!isOwnerOrAdmin(req, userId)) {
      res.status(403).json({ error: "Forbidden" });
      return;
    }

    try {
      res.json(await orders.listByUser(userId));
    } catch (err) {
      logger.error("Failed to list user orders", { ...errorMeta(err), userId });
      res.status(500).json({ error: "Failed to list orders" });
    }
  }

  async function updateOrderStatusHandler(
    req: Request,
    res: Response,
  ): Promise<void> {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      res.status(400).json({ errors: errors.array() });
      return;
    }

    const id = parseInt(req.params.id, 10);
    const { status }: { status: string } = matchedData(req, {
      locations: ["body"],
    });

    try {
      const order = await orders.get(id);
      if (!order) {
        res.status(404).json({ error: "Order not found" });
        return;
      }

      if (!isOwnerOrAdmin(req, order.userId)) {
        res.status(403).json({ error: "Forbidden" });
        return;
      }

      const updated = await orders.updateStatus(id, status);
      if (!updated) {
        res.status(404).json({ error: "Order not found" });
        return;
      }
      res.json({ success: true });
    } catch (err) {
      logger.error("Failed to update order status", {
        ...errorMeta(err),
        orderId: id,
      });
      res.status(500).json({ error: "Failed to update order status" });
    }
  }

  return {
    listOrdersHandler,
    createOrderHandler,
    listUserOrdersHandler,
    updateOrderStatusHandler,
  };
}
