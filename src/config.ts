import dotenv from "dotenv";

dotenv.config();

// Whole numbers only: "12abc" and "1e3" are rejected, not truncated
export function parseInteger(
  raw: string | undefined,
  fallback: number,
): number {
  if (raw === undefined || !/^\s*-?\d+\s*$/.test(raw)) return fallback;
  return Number(raw);
}

export function parseIdList(raw: string | undefined): number[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map(Number);
}

export const config = {
  server: {
    port: parseInteger(process.env.PORT, 5000),
    host: process.env.HOST || "0.0.0.0",
  },
  redis: {
    url: process.env.REDIS_URL || "redis://localhost:6379",
  },
  admin: {
    // Messaging-platform user ids allowed to manage the shop
    ids: parseIdList(process.env.ADMIN_IDS),
  },
  referral: {
    bonus: parseInteger(process.env.REFERRAL_BONUS, 50),
  },
  seed: {
    sampleProducts: process.env.SEED_SAMPLE_DATA !== "false",
  },
  logging: {
    level: process.env.LOG_LEVEL || "info",
  },
  cors: {
    origin: process.env.CORS_ORIGIN || "*",
  },
};
