import { STATUS_CODES } from 'node:http';
import { type HeaderOptions, mergeHeaderOptions } from './utils.js';

/** Fields accepted by {@link ApiResponse}; everything defaults to an empty 200. */
export interface ApiResponseInit {
  status?: number;
  /** Reason phrase; defaults to the standard phrase for `status`. */
  statusText?: string;
  headers?: HeaderOptions;
  body?: string | null;
}

/**
 * Raw HTTP response as returned by a transport. Read-only after receipt:
 * the body is already read into a string.
 */
export class ApiResponse {
  readonly status: number;
  readonly statusText: string;
  readonly headers: Headers;
  readonly body: string;

  constructor({ status = 200, statusText, headers, body }: ApiResponseInit = {}) {
    this.status = status;
    this.statusText = statusText ?? STATUS_CODES[status] ?? '';
    this.headers = mergeHeaderOptions(headers);
    this.body = body ?? '';
  }

  /** Convenience for JSON bodies, used by mocks and tests. */
  static json(body: unknown, init: Omit<ApiResponseInit, 'body'> = {}): ApiResponse {
    return new ApiResponse({
      ...init,
      headers: mergeHeaderOptions({ 'Content-Type': 'application/json' }, init.headers),
      body: JSON.stringify(body),
    });
  }
}
