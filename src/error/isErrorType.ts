import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Type guard matching `err`, or anything in its `cause` chain, against an error class.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
