import type { ApiRequest } from '../transport/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Network-level failure: the transport could not produce a response.
 * The underlying error is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static override name = 'TransportError';
  /** Request that failed to send */
  #request: ApiRequest;

  constructor(message: string, request: ApiRequest, opts?: ErrorOptions) {
    super(message, opts);
    this.#request = request;
  }

  /** Request that failed to send */
  get request(): ApiRequest {
    return this.#request;
  }
}

/**
 * Extracts a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
