import winston from "winston";
import { config } from "../config";

export const logger = winston.createLogger({
  level: config.logging.level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json(),
  ),
  defaultMeta: { service: "vape-shop-api" },
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === "test",
});

// Structured metadata for a caught error
export function errorMeta(err: unknown): Record<string, unknown> {
  if (err instanceof Error) {
    return { error: err.message, name: err.name };
  }
  return { error: String(err) };
}
