/**
 * Caller identification and admin authorization
 *
 * The storefront runs inside a messaging-platform web app, which forwards
 * the platform user id in the X-User-Id header. Admin rights come from the
 * configured allow-list only.
 */

import { Request, Response, NextFunction } from "express";
import { UserService } from "../services/userService";
import { logger } from "../services/logger";

export const USER_ID_HEADER = "x-user-id";

// Extend Express Request to include the caller
declare module "express-serve-static-core" {
  interface Request {
    userId?: number;
    isAdmin?: boolean;
  }
}

/**
 * Identification middleware - reads the caller id, if any
 */
export function identify(users: UserService) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const raw = req.header(USER_ID_HEADER);

    if (raw === undefined || raw === "") {
      next();
      return;
    }

    if (!/^\d+$/.test(raw)) {
      res.status(400).json({ error: "Invalid X-User-Id header" });
      return;
    }

    const userId = parseInt(raw, 10);
    req.userId = userId;
    req.isAdmin = users.isAdmin(userId);
    next();
  };
}

export function requireUser(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (req.userId === undefined) {
    res.status(401).json({ error: "Authentication required" });
    return;
  }
  next();
}

export function requireAdmin(
  req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (req.userId === undefined) {
    res.status(401).json({ error: "Authentication required" });
    return;
  }

  if (!req.isAdmin) {
    logger.warn("Admin access denied", {
      userId: req.userId,
      path: req.originalUrl,
      method: req.method,
    });
    res.status(403).json({ error: "Forbidden: Admin access required" });
    return;
  }

  next();
}

/**
 * True when the caller owns the resource or is an admin
 */
export function isOwnerOrAdmin(req: Request, ownerId: number): boolean {
  return req.isAdmin === true || req.userId === ownerId;
}
