import { Response } from "express";
import { FailureKind } from "../models/record";

const FAILURE_STATUS: Record<FailureKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  limit_reached: 400,
};

/**
 * Send a repository failure with its HTTP status
 */
export function sendFailure(
  res: Response,
  failure: { error: FailureKind; message: string },
): void {
  res
    .status(FAILURE_STATUS[failure.error])
    .json({ error: failure.message, code: failure.error });
}
