/** Header containers accepted across the SDK; `null`/`undefined` values delete a header when merging. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merges header containers left to right into a fresh `Headers` instance.
 * Later values win; a `null`/`undefined` value removes what came before.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      const clean = sanitize(value);
      if (clean !== null) {
        merged.set(key, clean);
      }
    }
  }

  return merged;
}

/** Plain-object view of a `Headers` instance (lower-cased names). */
export function headersToRecord(headers: Headers): Record<string, string> {
  return Object.fromEntries(headers.entries());
}
