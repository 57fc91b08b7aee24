import { getDefaultClient } from '../core/registry.js';
import { type Params, normalizeParams } from '../utils/createUri.js';
import type { RestClient } from './types.js';

/**
 * Base of the per-resource services. Uses the client it was given, or the
 * default client registered with `initDefaultClient` at call time.
 */
export abstract class Service {
  #client: RestClient | null;

  constructor(client: RestClient | null = null) {
    this.#client = client;
  }

  protected client(): RestClient {
    return this.#client ?? getDefaultClient();
  }

  /** Caller params plus path params; path params win on conflict. */
  protected withPathParams(params: Params, pathParams: Record<string, string>): Params {
    const merged = normalizeParams(params);
    for (const [key, value] of Object.entries(pathParams)) {
      merged.set(key, value);
    }

    return merged;
  }
}
