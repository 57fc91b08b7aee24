import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Raised for any 5xx response.
 */
export class ServerError extends HTTPError {
  /** ServerError error-name */
  static override name = 'ServerError';
}

/**
 * Extracts a {@link ServerError} from an unknown error value, following nested causes.
 */
export function getServerError(error: unknown): ServerError | null {
  return unwrapErrorType(ServerError, error);
}

/**
 * Type guard for {@link ServerError}.
 */
export function isServerError(error: unknown): error is ServerError {
  return isErrorType(ServerError, error);
}
