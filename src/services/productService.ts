/**
 * Product catalog repository
 */

import {
  Product,
  ProductInput,
  productToRecord,
  recordToProduct,
} from "../models/product";
import { isEmptyRecord, now } from "../models/record";
import { counterKey, IdAllocator } from "./idAllocator";
import { logger } from "./logger";
import { KeyValueStore } from "./store";

const PREFIX = "product:";

function productKey(id: number): string {
  return `${PREFIX}${id}`;
}

export class ProductService {
  constructor(
    private readonly store: KeyValueStore,
    private readonly ids: IdAllocator,
  ) {}

  /**
   * List all products, ascending by id
   */
  async list(): Promise<Product[]> {
    const keys = await this.store.keysWithPrefix(PREFIX);
    const records = await Promise.all(
      keys
        .filter((key) => key !== counterKey("product"))
        .map((key) => this.store.getFields(key)),
    );

    return records
      .filter((record) => !isEmptyRecord(record))
      .map(recordToProduct)
      .sort((a, b) => a.id - b.id);
  }

  async get(id: number): Promise<Product | null> {
    const record = await this.store.getFields(productKey(id));
    return isEmptyRecord(record) ? null : recordToProduct(record);
  }

  /**
   * Create a product, or update the one named by data.id.
   *
   * Only supplied fields are written, so an update keeps the stored values
   * of anything it omits. created_at is never moved once set.
   */
  async save(data: ProductInput): Promise<Product> {
    const isNew = data.id === undefined;
    const id = data.id ?? (await this.ids.next("product"));
    const key = productKey(id);

    let createdAt = data.created_at;
    if (!createdAt && !isNew) {
      const existing = await this.store.getFields(key);
      createdAt = existing.created_at;
    }

    const record = productToRecord({
      ...data,
      id,
      created_at: createdAt || now(),
      updated_at: now(),
    });
    await this.store.setFields(key, record);

    const saved = recordToProduct(await this.store.getFields(key));
    logger.info(isNew ? "Product created" : "Product updated", {
      productId: id,
      name: saved.name,
    });
    return saved;
  }

  async delete(id: number): Promise<boolean> {
    const removed = await this.store.deleteKey(productKey(id));
    if (removed) {
      logger.info("Product deleted", { productId: id });
    }
    return removed;
  }
}
