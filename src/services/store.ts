/**
 * Key-value store client
 *
 * Records are Redis hashes keyed "<entity>:<id>". Every repository talks to
 * the store through the KeyValueStore interface so tests can swap in an
 * in-process double.
 */

import Redis from "ioredis";
import { config } from "../config";
import { logger } from "./logger";

export type StoreRecord = Record<string, string>;

export interface KeyValueStore {
  increment(key: string): Promise<number>;
  incrementField(key: string, field: string, by: number): Promise<number>;
  setFields(key: string, fields: StoreRecord): Promise<void>;
  /** Empty object when the key does not exist */
  getFields(key: string): Promise<StoreRecord>;
  deleteKey(key: string): Promise<boolean>;
  keysWithPrefix(prefix: string): Promise<string[]>;
  existsKey(key: string): Promise<boolean>;
  isHealthy(): Promise<boolean>;
  disconnect(): Promise<void>;
}

/**
 * Raised when the underlying store is unreachable or rejects an operation.
 */
export class StoreError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation ${operation} failed: ${reason}`, { cause });
    this.name = "StoreError";
    this.operation = operation;
  }
}

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(url: string = config.redis.url) {
    this.client = new Redis(url, { lazyConnect: true });
    this.client.on("error", (err: Error) => {
      logger.error("Redis connection error", { error: err.message });
    });
  }

  async connect(): Promise<void> {
    await this.run("connect", () => this.client.connect());
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  increment(key: string): Promise<number> {
    return this.run("increment", () => this.client.incr(key));
  }

  incrementField(key: string, field: string, by: number): Promise<number> {
    return this.run("incrementField", () =>
      this.client.hincrby(key, field, by),
    );
  }

  async setFields(key: string, fields: StoreRecord): Promise<void> {
    if (Object.keys(fields).length === 0) return;
    await this.run("setFields", () => this.client.hset(key, fields));
  }

  getFields(key: string): Promise<StoreRecord> {
    return this.run("getFields", () => this.client.hgetall(key));
  }

  async deleteKey(key: string): Promise<boolean> {
    const removed = await this.run("deleteKey", () => this.client.del(key));
    return removed > 0;
  }

  async existsKey(key: string): Promise<boolean> {
    const count = await this.run("existsKey", () => this.client.exists(key));
    return count > 0;
  }

  keysWithPrefix(prefix: string): Promise<string[]> {
    return this.run("keysWithPrefix", async () => {
      const keys = new Set<string>();
      const stream = this.client.scanStream({
        match: `${prefix}*`,
        count: 100,
      });
      for await (const batch of stream) {
        const found: string[] = batch;
        for (const key of found) keys.add(key);
      }
      return [...keys];
    });
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new StoreError(operation, err);
    }
  }
}
