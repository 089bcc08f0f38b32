/**
 * User profile repository
 */

import { isEmptyRecord, now, Outcome } from "../models/record";
import {
  User,
  recordToUser,
  referralCodeFor,
  userIdFromReferralCode,
  userToRecord,
} from "../models/user";
import { logger } from "./logger";
import { KeyValueStore } from "./store";

const PREFIX = "user:";

function userKey(id: number): string {
  return `${PREFIX}${id}`;
}

export interface UserServiceOptions {
  adminIds: ReadonlySet<number>;
  referralBonus: number;
}

export type ReferralOutcome = Outcome<{ referrer: User }>;

export class UserService {
  private readonly adminIds: ReadonlySet<number>;
  private readonly referralBonus: number;

  constructor(
    private readonly store: KeyValueStore,
    options: UserServiceOptions,
  ) {
    this.adminIds = options.adminIds;
    this.referralBonus = options.referralBonus;
  }

  isAdmin(id: number): boolean {
    return this.adminIds.has(id);
  }

  async get(id: number): Promise<User | null> {
    const record = await this.store.getFields(userKey(id));
    return isEmptyRecord(record) ? null : recordToUser(record, this.adminIds);
  }

  async list(): Promise<User[]> {
    const keys = await this.store.keysWithPrefix(PREFIX);
    const records = await Promise.all(
      keys.map((key) => this.store.getFields(key)),
    );

    return records
      .filter((record) => !isEmptyRecord(record))
      .map((record) => recordToUser(record, this.adminIds))
      .sort((a, b) => a.id - b.id);
  }

  /**
   * Overwrite every non-id field of the user record
   */
  async save(user: User): Promise<User> {
    const saved: User = {
      ...user,
      referrals: [...new Set(user.referrals)],
      isAdmin: this.isAdmin(user.id),
      created_at: user.created_at || now(),
      updated_at: now(),
    };

    await this.store.setFields(userKey(user.id), userToRecord(saved));
    return saved;
  }

  /**
   * Return the stored user, creating and persisting a default profile on
   * first sight of the id
   */
  async getOrCreate(id: number, username = ""): Promise<User> {
    const existing = await this.get(id);
    if (existing) {
      return existing;
    }

    const created = await this.save({
      id,
      username,
      bonus: 0,
      referrals: [],
      referralCode: referralCodeFor(id),
      referredBy: null,
      isAdmin: this.isAdmin(id),
      created_at: "",
      updated_at: "",
    });
    logger.info("User created", { userId: id, username });
    return created;
  }

  /**
   * Credit the owner of `code` for referring `userId`.
   *
   * Each user can be referred once, and never by someone they referred.
   *
   * Read-modify-write on the referrer's record: two concurrent redemptions
   * of the same code can lose one bonus.
   */
  async applyReferral(userId: number, code: string): Promise<ReferralOutcome> {
    const referrerId = userIdFromReferralCode(code);
    if (referrerId === null) {
      return {
        success: false,
        error: "not_found",
        message: "Referral code not found",
      };
    }

    if (referrerId === userId) {
      return {
        success: false,
        error: "validation",
        message: "Cannot use your own referral code",
      };
    }

    const referrer = await this.get(referrerId);
    if (!referrer) {
      return {
        success: false,
        error: "not_found",
        message: "Referral code not found",
      };
    }

    if (referrer.referrals.includes(userId)) {
      return {
        success: false,
        error: "conflict",
        message: "Referral already applied",
      };
    }

    const user = await this.get(userId);
    if (!user) {
      return { success: false, error: "not_found", message: "User not found" };
    }

    if (user.referredBy !== null) {
      return {
        success: false,
        error: "conflict",
        message: "User was already referred",
      };
    }

    if (referrer.referredBy === userId) {
      return {
        success: false,
        error: "conflict",
        message: "Cannot redeem the code of a user you referred",
      };
    }

    const updated = await this.save({
      ...referrer,
      referrals: [...referrer.referrals, userId],
      bonus: referrer.bonus + this.referralBonus,
    });
    await this.save({ ...user, referredBy: referrerId });
    logger.info("Referral applied", {
      referrerId,
      userId,
      bonus: updated.bonus,
    });

    return { success: true, referrer: updated };
  }
}
