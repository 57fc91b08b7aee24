import type { ApiResponse } from '../transport/response.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Base for every error raised from an HTTP status code (4xx and 5xx).
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static override name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: ApiResponse;

  /** Creates a new HTTPError wrapping the failed response */
  constructor(
    response: ApiResponse,
    message = `HTTP error: ${response.status} ${response.statusText}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.#response = response;
  }

  /** Response causing the HTTPError */
  get response(): ApiResponse {
    return this.#response;
  }

  /** HTTP status code of the response */
  get status(): number {
    return this.#response.status;
  }

  /** Reason phrase of the response */
  get reason(): string {
    return this.#response.statusText;
  }
}

/**
 * Extracts an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}
