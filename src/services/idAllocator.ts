import { KeyValueStore } from "./store";

export type EntityType = "product" | "order";

export function counterKey(entity: EntityType): string {
  return `${entity}:counter`;
}

/**
 * Issues increasing integer ids per entity type from an atomic counter.
 * An id allocated before a failed save is skipped, never reused.
 */
export class IdAllocator {
  constructor(private readonly store: KeyValueStore) {}

  next(entity: EntityType): Promise<number> {
    return this.store.increment(counterKey(entity));
  }
}
