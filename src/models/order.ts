/**
 * Order model and record mapping
 */

import { StoreRecord } from "../services/store";
import { parseJsonArray, toInt } from "./record";

// Open set: any string is accepted, these are the ones the shop uses
export type OrderStatus = "pending" | "completed" | "cancelled" | (string & {});

export const DEFAULT_ORDER_STATUS = "pending";
export const COMPLETED_ORDER_STATUS = "completed";

export interface OrderItem {
  productId: number;
  name?: string;
  quantity: number;
  price: number;
}

function isOrderItem(value: unknown): value is OrderItem {
  if (typeof value !== "object" || value === null) return false;
  const item: Record<string, unknown> = { ...value };
  return (
    typeof item.productId === "number" &&
    typeof item.quantity === "number" &&
    typeof item.price === "number"
  );
}

export interface Order {
  id: number;
  userId: number;
  items: OrderItem[];
  total: number;
  status: OrderStatus;
  created_at: string;
  updated_at: string;
}

export interface OrderInput {
  id?: number;
  userId: number;
  items: OrderItem[];
  total: number;
  status?: OrderStatus;
  created_at?: string;
}

export function recordToOrder(record: StoreRecord): Order {
  return {
    id: toInt(record.id),
    userId: toInt(record.userId),
    items: parseJsonArray(record.items).filter(isOrderItem),
    total: toInt(record.total),
    status: record.status ?? DEFAULT_ORDER_STATUS,
    created_at: record.created_at ?? "",
    updated_at: record.updated_at ?? "",
  };
}

export function orderToRecord(order: Order): StoreRecord {
  return {
    id: String(order.id),
    userId: String(order.userId),
    items: JSON.stringify(order.items),
    total: String(order.total),
    status: order.status,
    created_at: order.created_at,
    updated_at: order.updated_at,
  };
}
