import type { ApiResponse } from '../transport/response.js';
import { HTTPError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * One entry of a 422 response's `details`: a plain message, or an object
 * such as `{ field, error }` or `{ field, message }`, passed through as sent.
 */
export type FieldError = string | Record<string, unknown>;

/**
 * Raised for a 422 response; `details` holds the body's field errors.
 */
export class UnprocessableEntityError extends HTTPError {
  /** UnprocessableEntityError error-name */
  static override name = 'UnprocessableEntityError';
  /** `details` of the response body, empty when the body had none */
  details: FieldError[];

  constructor(response: ApiResponse, details: FieldError[], opts?: ErrorOptions) {
    super(response, `unprocessable entity; details: ${JSON.stringify(details)}`, opts);
    this.details = details;
  }
}

/**
 * Extracts an {@link UnprocessableEntityError} from an unknown error value, following nested causes.
 */
export function getUnprocessableEntityError(error: unknown): UnprocessableEntityError | null {
  return unwrapErrorType(UnprocessableEntityError, error);
}

/**
 * Type guard for {@link UnprocessableEntityError}.
 */
export function isUnprocessableEntityError(error: unknown): error is UnprocessableEntityError {
  return isErrorType(UnprocessableEntityError, error);
}
