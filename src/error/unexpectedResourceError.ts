import { isErrorType } from './isErrorType.js';

/**
 * Raised by a service when the resolved resource is not of the type the
 * operation promises (e.g. a collection where an entity was expected).
 */
export class UnexpectedResourceError extends Error {
  /** UnexpectedResourceError error-name */
  static override name = 'UnexpectedResourceError';
  /** Name of the type the caller expected */
  expected: string;
  /** What was resolved instead */
  received: unknown;

  constructor(expected: string, received: unknown, opts?: ErrorOptions) {
    super(`error expected ${expected} resource, received ${describeValue(received)}`, opts);
    this.expected = expected;
    this.received = received;
  }
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }

  return typeof value === 'object' ? value.constructor.name : typeof value;
}

/**
 * Type guard for {@link UnexpectedResourceError}.
 */
export function isUnexpectedResourceError(error: unknown): error is UnexpectedResourceError {
  return isErrorType(UnexpectedResourceError, error);
}
