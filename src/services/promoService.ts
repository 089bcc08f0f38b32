/**
 * Promo code repository
 *
 * Neither creation nor redemption is atomic end to end. Two creators of the
 * same code can both pass the existence check (the later write wins), and
 * concurrent redemptions near the limit can both pass the limit check, so
 * `used` can end up above `uses`. Only the counter bump itself is atomic.
 */

import {
  CreatePromoInput,
  Promo,
  promoToRecord,
  recordToPromo,
} from "../models/promo";
import { isEmptyRecord, now, Outcome } from "../models/record";
import { logger } from "./logger";
import { KeyValueStore } from "./store";

const PREFIX = "promo:";

function promoKey(code: string): string {
  return `${PREFIX}${code}`;
}

export type CreatePromoOutcome = Outcome<{ promo: Promo }>;
export type ApplyPromoOutcome = Outcome<{ discount: number; used: number }>;

export class PromoService {
  constructor(private readonly store: KeyValueStore) {}

  async list(): Promise<Promo[]> {
    const keys = await this.store.keysWithPrefix(PREFIX);
    const records = await Promise.all(
      keys.map((key) => this.store.getFields(key)),
    );
    return records.filter((record) => !isEmptyRecord(record)).map(recordToPromo);
  }

  async get(code: string): Promise<Promo | null> {
    const record = await this.store.getFields(promoKey(code));
    return isEmptyRecord(record) ? null : recordToPromo(record);
  }

  async create(data: CreatePromoInput): Promise<CreatePromoOutcome> {
    const key = promoKey(data.code);
    if (await this.store.existsKey(key)) {
      return {
        success: false,
        error: "conflict",
        message: "Promo code already exists",
      };
    }

    const timestamp = now();
    const promo: Promo = {
      code: data.code,
      discount: data.discount,
      uses: data.uses,
      used: data.used ?? 0,
      created_at: timestamp,
      updated_at: timestamp,
    };
    await this.store.setFields(key, promoToRecord(promo));
    logger.info("Promo created", {
      code: promo.code,
      discount: promo.discount,
      uses: promo.uses,
    });

    return { success: true, promo };
  }

  async apply(code: string, userId: number): Promise<ApplyPromoOutcome> {
    const promo = await this.get(code);
    if (!promo) {
      return {
        success: false,
        error: "not_found",
        message: "Promo code not found",
      };
    }

    if (promo.used >= promo.uses) {
      return {
        success: false,
        error: "limit_reached",
        message: "Promo code usage limit reached",
      };
    }

    const key = promoKey(code);
    const used = await this.store.incrementField(key, "used", 1);
    await this.store.setFields(key, { updated_at: now() });
    logger.info("Promo applied", { code, userId, used });

    return { success: true, discount: promo.discount, used };
  }
}
