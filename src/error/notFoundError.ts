import type { ApiResponse } from '../transport/response.js';
import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Raised for a 404 response. Carries no body details.
 */
export class NotFoundError extends HTTPError {
  /** NotFoundError error-name */
  static override name = 'NotFoundError';

  constructor(response: ApiResponse, message = 'resource not found', opts?: ErrorOptions) {
    super(response, message, opts);
  }
}

/**
 * Extracts a {@link NotFoundError} from an unknown error value, following nested causes.
 */
export function getNotFoundError(error: unknown): NotFoundError | null {
  return unwrapErrorType(NotFoundError, error);
}

/**
 * Type guard for {@link NotFoundError}.
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return isErrorType(NotFoundError, error);
}
