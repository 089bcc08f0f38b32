/**
 * Shop statistics
 *
 * A materialized view over products, orders and users. It is recomputed in
 * full whenever an order changes, which costs a scan of every entity; fine
 * for a small shop, a known ceiling for a large one.
 */

import { Order, COMPLETED_ORDER_STATUS } from "../models/order";
import { Product } from "../models/product";
import { isEmptyRecord, now } from "../models/record";
import { Stats, recordToStats, statsToRecord } from "../models/stats";
import { User } from "../models/user";
import { KeyValueStore } from "./store";

export const STATS_KEY = "stats";

export interface StatsSources {
  products(): Promise<Product[]>;
  orders(): Promise<Order[]>;
  users(): Promise<User[]>;
}

export class StatsService {
  constructor(
    private readonly store: KeyValueStore,
    private readonly sources: StatsSources,
  ) {}

  async recompute(): Promise<Stats> {
    const [products, orders, users] = await Promise.all([
      this.sources.products(),
      this.sources.orders(),
      this.sources.users(),
    ]);

    const stats: Stats = {
      total_orders: orders.length,
      total_products: products.length,
      total_users: users.length,
      total_revenue: orders
        .filter((order) => order.status === COMPLETED_ORDER_STATUS)
        .reduce((sum, order) => sum + order.total, 0),
      updated_at: now(),
    };

    await this.store.setFields(STATS_KEY, statsToRecord(stats));
    return stats;
  }

  async get(): Promise<Stats> {
    const record = await this.store.getFields(STATS_KEY);
    if (isEmptyRecord(record)) {
      return this.recompute();
    }
    return recordToStats(record);
  }
}
