import { Uri } from '../utils/uri.js';
import type { HttpMethod } from './types.js';
import { type HeaderOptions, mergeHeaderOptions } from './utils.js';

/**
 * Outgoing request. Immutable; middleware derives modified copies through
 * the `with*` methods.
 */
export class ApiRequest {
  readonly method: HttpMethod;
  readonly uri: Uri;
  readonly body: string | null;
  #headers: Headers;

  constructor(method: HttpMethod, uri: Uri | string, headers?: HeaderOptions, body: string | null = null) {
    this.method = method;
    this.uri = typeof uri === 'string' ? Uri.parse(uri) : uri;
    this.body = body;
    this.#headers = mergeHeaderOptions(headers);
  }

  /** Copy of the request headers. */
  get headers(): Headers {
    return mergeHeaderOptions(this.#headers);
  }

  /** Header value or `null` (case-insensitive). */
  header(name: string): string | null {
    return this.#headers.get(name);
  }

  /** Copy targeting another URI. */
  withUri(uri: Uri): ApiRequest {
    return new ApiRequest(this.method, uri, this.#headers, this.body);
  }

  /** Copy with one header set (or replaced). */
  withHeader(name: string, value: string): ApiRequest {
    return new ApiRequest(this.method, this.uri, mergeHeaderOptions(this.#headers, { [name]: value }), this.body);
  }
}
