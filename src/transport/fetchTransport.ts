import { TransportError } from '../error/transportError.js';
import { safeWrapAsync } from '../utils/wrap.js';
import type { ApiRequest } from './request.js';
import { ApiResponse } from './response.js';
import type { Transport } from './types.js';
import { type HeaderOptions, mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /** Headers sent with every request; request headers win on conflict. */
  headers?: HeaderOptions;
  /**
   * Redirect handling. Redirects are not followed by default, so a 3xx and
   * its `Location` reach the client untouched.
   * @default 'manual'
   */
  redirect?: 'follow' | 'manual' | 'error';
  /** Per-request timeout in milliseconds; no timeout when unset. */
  timeout?: number;
}

/**
 * {@link Transport} over Node's global `fetch`.
 *
 * - Any status is returned as a response; only network-level failures reject,
 *   as {@link TransportError} with the original error as `cause`.
 * - `GET` and `HEAD` never carry a body.
 */
export class FetchTransport implements Transport {
  #opts: FetchTransportOptions;

  constructor(opts: FetchTransportOptions = {}) {
    this.#opts = opts;
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    const url = request.uri.toString();
    const { timeout, redirect = 'manual' } = this.#opts;
    const withoutBody = request.method === 'GET' || request.method === 'HEAD';

    const [errFetch, res] = await safeWrapAsync(() =>
      fetch(url, {
        method: request.method,
        headers: mergeHeaderOptions(this.#opts.headers, request.headers),
        body: withoutBody ? undefined : (request.body ?? undefined),
        redirect,
        ...(timeout === undefined ? {} : { signal: AbortSignal.timeout(timeout) }),
      }),
    );

    if (errFetch) {
      throw new TransportError(`error sending ${request.method} request to ${url}`, request, { cause: errFetch });
    }

    const [errText, text] = await safeWrapAsync(() => res.text());
    if (errText) {
      throw new TransportError(`error reading ${request.method} response from ${url}`, request, { cause: errText });
    }

    return new ApiResponse({
      status: res.status,
      statusText: res.statusText,
      headers: res.headers,
      body: text,
    });
  }
}
