/**
 * Order repository
 *
 * Every write recomputes the shop statistics before returning.
 */

import {
  Order,
  OrderInput,
  OrderStatus,
  DEFAULT_ORDER_STATUS,
  orderToRecord,
  recordToOrder,
} from "../models/order";
import { isEmptyRecord, now } from "../models/record";
import { counterKey, IdAllocator } from "./idAllocator";
import { logger } from "./logger";
import { StatsService } from "./statsService";
import { KeyValueStore } from "./store";

const PREFIX = "order:";

function orderKey(id: number): string {
  return `${PREFIX}${id}`;
}

export class OrderService {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ids: IdAllocator,
    private readonly stats: StatsService,
  ) {}

  /**
   * List all orders, most recent first
   */
  async list(): Promise<Order[]> {
    const keys = await this.store.keysWithPrefix(PREFIX);
    const records = await Promise.all(
      keys
        .filter((key) => key !== counterKey("order"))
        .map((key) => this.store.getFields(key)),
    );

    return records
      .filter((record) => !isEmptyRecord(record))
      .map(recordToOrder)
      .sort((a, b) => b.id - a.id);
  }

  async get(id: number): Promise<Order | null> {
    const record = await this.store.getFields(orderKey(id));
    return isEmptyRecord(record) ? null : recordToOrder(record);
  }

  // No secondary index: this scans every order
  async listByUser(userId: number): Promise<Order[]> {
    const orders = await this.list();
    return orders.filter((order) => order.userId === userId);
  }

  async save(data: OrderInput): Promise<Order> {
    const id = data.id ?? (await this.ids.next("order"));
    const order: Order = {
      id,
      userId: data.userId,
      items: data.items,
      total: data.total,
      status: data.status ?? DEFAULT_ORDER_STATUS,
      created_at: data.created_at ?? now(),
      updated_at: now(),
    };

    await this.store.setFields(orderKey(id), orderToRecord(order));
    logger.info("Order saved", {
      orderId: id,
      userId: order.userId,
      total: order.total,
      status: order.status,
    });

    await this.stats.recompute();
    return order;
  }

  async updateStatus(id: number, status: OrderStatus): Promise<boolean> {
    const key = orderKey(id);
    if (!(await this.store.existsKey(key))) {
      return false;
    }

    await this.store.setFields(key, { status, updated_at: now() });
    logger.info("Order status updated", { orderId: id, status });

    await this.stats.recompute();
    return true;
  }
}
