import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Raised for a 4xx response other than 404 and 422.
 */
export class ClientError extends HTTPError {
  /** ClientError error-name */
  static override name = 'ClientError';
}

/**
 * Extracts a {@link ClientError} from an unknown error value, following nested causes.
 */
export function getClientError(error: unknown): ClientError | null {
  return unwrapErrorType(ClientError, error);
}

/**
 * Type guard for {@link ClientError}.
 */
export function isClientError(error: unknown): error is ClientError {
  return isErrorType(ClientError, error);
}
