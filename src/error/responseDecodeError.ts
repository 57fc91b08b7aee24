import { isErrorType } from './isErrorType.js';

/**
 * Raised when a successful response body is not valid JSON.
 */
export class ResponseDecodeError extends Error {
  /** ResponseDecodeError error-name */
  static override name = 'ResponseDecodeError';
  /** Raw body that failed to decode */
  body: string;

  constructor(message: string, body: string, opts?: ErrorOptions) {
    super(message, opts);
    this.body = body;
  }
}

/**
 * Type guard for {@link ResponseDecodeError}.
 */
export function isResponseDecodeError(error: unknown): error is ResponseDecodeError {
  return isErrorType(ResponseDecodeError, error);
}
