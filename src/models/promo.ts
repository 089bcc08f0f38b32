/**
 * Promo code model and record mapping
 */

import { StoreRecord } from "../services/store";
import { toInt } from "./record";

export interface Promo {
  code: string;
  /** Percentage off the order total */
  discount: number;
  /** Maximum number of redemptions */
  uses: number;
  used: number;
  created_at: string;
  updated_at: string;
}

export interface CreatePromoInput {
  code: string;
  discount: number;
  uses: number;
  used?: number;
}

export function recordToPromo(record: StoreRecord): Promo {
  return {
    code: record.code ?? "",
    discount: toInt(record.discount),
    uses: toInt(record.uses),
    used: toInt(record.used),
    created_at: record.created_at ?? "",
    updated_at: record.updated_at ?? "",
  };
}

export function promoToRecord(promo: Promo): StoreRecord {
  return {
    code: promo.code,
    discount: String(promo.discount),
    uses: String(promo.uses),
    used: String(promo.used),
    created_at: promo.created_at,
    updated_at: promo.updated_at,
  };
}
