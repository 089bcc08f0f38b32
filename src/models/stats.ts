/**
 * Aggregate shop statistics, stored as a single record
 */

import { StoreRecord } from "../services/store";
import { toInt } from "./record";

export interface Stats {
  total_orders: number;
  total_products: number;
  total_users: number;
  total_revenue: number;
  updated_at: string;
}

export function recordToStats(record: StoreRecord): Stats {
  return {
    total_orders: toInt(record.total_orders),
    total_products: toInt(record.total_products),
    total_users: toInt(record.total_users),
    total_revenue: toInt(record.total_revenue),
    updated_at: record.updated_at ?? "",
  };
}

export function statsToRecord(stats: Stats): StoreRecord {
  return {
    total_orders: String(stats.total_orders),
    total_products: String(stats.total_products),
    total_users: String(stats.total_users),
    total_revenue: String(stats.total_revenue),
    updated_at: stats.updated_at,
  };
}
