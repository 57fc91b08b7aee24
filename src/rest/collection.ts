import type { Entity, EntityClass } from './entity.js';

/** Paging metadata; `null` when the response did not say. */
export interface CollectionMeta {
  total: number | null;
  offset: number | null;
  limit: number | null;
}

/** Page of entities with its paging metadata. */
export class Collection<T extends Entity = Entity> implements Iterable<T> {
  readonly items: readonly T[];
  readonly total: number | null;
  readonly offset: number | null;
  readonly limit: number | null;

  constructor(items: Iterable<T>, { total = null, offset = null, limit = null }: Partial<CollectionMeta> = {}) {
    this.items = [...items];
    this.total = total;
    this.offset = offset;
    this.limit = limit;
  }

  get length(): number {
    return this.items.length;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }

  toJSON() {
    return this.items.map((item) => item.toJSON());
  }
}

/** Whether `value` is a collection whose items are all `Type`. */
export function isCollectionOf<T extends Entity>(value: unknown, Type: EntityClass<T>): value is Collection<T> {
  return value instanceof Collection && value.items.every((item) => item instanceof Type);
}
