import type { ApiRequest } from '../transport/request.js';
import type { ApiResponse } from '../transport/response.js';
import type { Handler, Middleware } from './types.js';

/** One recorded exchange; `response` is `null` when the request failed. */
export interface HistoryEntry {
  request: ApiRequest;
  response: ApiResponse | null;
  error: unknown;
}

/** Keeps the last `limit` request/response pairs that passed through it. */
export class HistoryMiddleware implements Middleware {
  #limit: number;
  #entries: HistoryEntry[] = [];

  constructor(limit = 5) {
    this.#limit = Math.max(0, limit);
  }

  /** Recorded exchanges, oldest first. */
  get entries(): readonly HistoryEntry[] {
    return [...this.#entries];
  }

  /** Most recent exchange, if any. */
  get last(): HistoryEntry | null {
    return this.#entries.at(-1) ?? null;
  }

  clear() {
    this.#entries = [];
  }

  async handle(request: ApiRequest, next: Handler) {
    try {
      const response = await next(request);
      this.#record({ request, response, error: null });
      return response;
    } catch (error) {
      this.#record({ request, response: null, error });
      throw error;
    }
  }

  #record(entry: HistoryEntry) {
    this.#entries.push(entry);
    while (this.#entries.length > this.#limit) {
      this.#entries.shift();
    }
  }
}
