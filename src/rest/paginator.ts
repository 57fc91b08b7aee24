import { type ParamValue, type Params, normalizeParams } from '../utils/createUri.js';
import type { Collection } from './collection.js';
import type { Entity, EntityClass } from './entity.js';
import { expectCollection } from './expect.js';
import type { RestClient } from './types.js';

const DEFAULT_LIMIT = 100;

function toCount(value: unknown, fallback: number): number {
  const count = Number(value);
  return Number.isInteger(count) && count >= 0 ? count : fallback;
}

/**
 * Walks a collection endpoint page by page using `limit`/`offset`.
 *
 * Stops on an empty page, a page shorter than `limit`, or once `offset`
 * reaches the reported `total`. Each iteration issues one request.
 *
 * @example
 * for await (const page of service.paginator({ limit: 50 })) {
 *   for (const website of page) console.log(website.name);
 * }
 */
export class Paginator<T extends Entity> implements AsyncIterable<Collection<T>> {
  #client: RestClient;
  #path: string;
  #type: EntityClass<T>;
  #params: Map<string, ParamValue>;
  #limit: number;
  #offset: number;

  constructor(client: RestClient, path: string, type: EntityClass<T>, params: Params = {}) {
    const normalized = normalizeParams(params);

    this.#client = client;
    this.#path = path;
    this.#type = type;
    this.#params = normalized;
    this.#limit = toCount(normalized.get('limit'), DEFAULT_LIMIT) || DEFAULT_LIMIT;
    this.#offset = toCount(normalized.get('offset'), 0);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Collection<T>> {
    let offset = this.#offset;

    while (true) {
      const params = normalizeParams(this.#params);
      params.set('limit', this.#limit);
      params.set('offset', offset);

      const page = expectCollection(this.#type, await this.#client.get(this.#path, params));
      if (page.length === 0) {
        return;
      }

      yield page;

      offset += page.length;
      if (page.length < this.#limit || (page.total !== null && offset >= page.total)) {
        return;
      }
    }
  }

  /** Every item of every page, in order. */
  async all(): Promise<T[]> {
    const items: T[] = [];
    for await (const page of this) {
      items.push(...page);
    }

    return items;
  }
}
