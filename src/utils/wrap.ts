/**
 * Error-first tuple, `[error, data]`. Used internally wherever a step can fail
 * and the caller decides whether to raise.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and captures a rejection as the error slot.
 * @example
 * const [err, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    return [null, await promise()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Synchronous counterpart of {@link safeWrapAsync}.
 * @example
 * const [err, body] = safeWrap(() => JSON.parse(text));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
