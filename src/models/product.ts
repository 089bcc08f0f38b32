/**
 * Product model and record mapping
 */

import { StoreRecord } from "../services/store";
import { toInt } from "./record";

export interface Product {
  id: number;
  name: string;
  category: string;
  price: number;
  stock: number;
  description: string;
  emoji: string;
  created_at: string;
  updated_at: string;
}

export interface ProductInput {
  id?: number;
  name?: string;
  category?: string;
  price?: number;
  stock?: number;
  description?: string;
  emoji?: string;
  created_at?: string;
}

export function recordToProduct(record: StoreRecord): Product {
  return {
    id: toInt(record.id),
    name: record.name ?? "",
    category: record.category ?? "",
    price: toInt(record.price),
    stock: toInt(record.stock),
    description: record.description ?? "",
    emoji: record.emoji ?? "",
    created_at: record.created_at ?? "",
    updated_at: record.updated_at ?? "",
  };
}

// Only supplied fields are written; the store merges them into the hash
export function productToRecord(
  input: ProductInput & { id: number; created_at: string; updated_at: string },
): StoreRecord {
  const record: StoreRecord = {
    id: String(input.id),
    created_at: input.created_at,
    updated_at: input.updated_at,
  };
  if (input.name !== undefined) record.name = input.name;
  if (input.category !== undefined) record.category = input.category;
  if (input.price !== undefined) record.price = String(toInt(input.price));
  if (input.stock !== undefined) record.stock = String(toInt(input.stock));
  if (input.description !== undefined) record.description = input.description;
  if (input.emoji !== undefined) record.emoji = input.emoji;
  return record;
}
