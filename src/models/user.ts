/**
 * User model and record mapping
 *
 * Users are keyed by their messaging-platform id, which the caller supplies.
 * isAdmin is derived from the configured allow-list on every decode and is
 * never persisted.
 */

import { StoreRecord } from "../services/store";
import { parseJsonArray, toInt } from "./record";

export interface User {
  id: number;
  username: string;
  bonus: number;
  referrals: number[];
  referralCode: string;
  /** Whose code this user redeemed; a user can be referred once */
  referredBy: number | null;
  isAdmin: boolean;
  created_at: string;
  updated_at: string;
}

export interface UpdateUserInput {
  username?: string;
  bonus?: number;
}

export const REFERRAL_CODE_PREFIX = "REF";

export function referralCodeFor(userId: number): string {
  return `${REFERRAL_CODE_PREFIX}${userId}`;
}

// Inverse of referralCodeFor; null for anything that is not a referral code
export function userIdFromReferralCode(code: string): number | null {
  const normalized = code.trim().toUpperCase();
  if (!normalized.startsWith(REFERRAL_CODE_PREFIX)) return null;
  const digits = normalized.slice(REFERRAL_CODE_PREFIX.length);
  if (!/^\d+$/.test(digits)) return null;
  return parseInt(digits, 10);
}

export function recordToUser(
  record: StoreRecord,
  adminIds: ReadonlySet<number>,
): User {
  const id = toInt(record.id);
  return {
    id,
    username: record.username ?? "",
    bonus: toInt(record.bonus),
    referrals: parseJsonArray(record.referrals).filter(
      (value): value is number => Number.isInteger(value),
    ),
    referralCode: record.referralCode || referralCodeFor(id),
    referredBy: record.referredBy ? toInt(record.referredBy) : null,
    isAdmin: adminIds.has(id),
    created_at: record.created_at ?? "",
    updated_at: record.updated_at ?? "",
  };
}

export function userToRecord(user: User): StoreRecord {
  return {
    id: String(user.id),
    username: user.username,
    bonus: String(Math.max(0, toInt(user.bonus))),
    referrals: JSON.stringify([...new Set(user.referrals)]),
    referralCode: user.referralCode,
    referredBy: user.referredBy === null ? "" : String(user.referredBy),
    created_at: user.created_at,
    updated_at: user.updated_at,
  };
}
