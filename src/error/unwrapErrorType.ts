/** Any error class, whatever its constructor arguments. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Walks an error and its `cause` chain, returning the first link that is an
 * instance of `errorClass`, or `null`.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
