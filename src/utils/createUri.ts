import { Uri } from './uri.js';

/** Value accepted in a URI parameter map. */
export type ParamValue = string | number | boolean | null | undefined | ParamValue[] | { [key: string]: ParamValue };

/** URI parameters: fill `{name}` placeholders first, the rest becomes the query string. */
export type Params = Record<string, ParamValue> | Map<string, ParamValue>;

const PLACEHOLDER = /\{\w+\}/g;

function isScalar(value: ParamValue): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/** Copies params into an insertion-ordered map; the caller's object is left alone. */
export function normalizeParams(params: Params = {}): Map<string, ParamValue> {
  return params instanceof Map ? new Map(params) : new Map(Object.entries(params));
}

function appendParam(search: URLSearchParams, key: string, value: ParamValue) {
  if (value === null || value === undefined) {
    return;
  }

  if (isScalar(value)) {
    search.append(key, String(value));
    return;
  }

  const entries: Array<[string, ParamValue]> = Array.isArray(value)
    ? value.map((item, index) => [String(index), item])
    : Object.entries(value);

  for (const [childKey, child] of entries) {
    appendParam(search, `${key}[${childKey}]`, child);
  }
}

/**
 * Builds a form-encoded query string in map order. `null`/`undefined` values
 * are skipped; arrays and objects use bracket notation (`tags[0]=a`).
 */
export function buildQuery(params: Params): string {
  const search = new URLSearchParams();
  for (const [key, value] of normalizeParams(params)) {
    appendParam(search, key, value);
  }

  return search.toString();
}

/**
 * Builds a request URI from a path template and a parameter map.
 *
 * - Each distinct `{name}` placeholder is replaced with the raw, stringified
 *   value of `params[name]` and that key is consumed. Placeholders without a
 *   scalar value are left in place.
 * - Keys that matched no placeholder are appended as the query string.
 * - A {@link Uri} passed in is not expanded; non-empty params replace its query.
 *
 * @example
 * createUri('bank-accounts/{bankAccountId}', { bankAccountId: 'ba_1', expand: 'customer' }).toString();
 * // => 'bank-accounts/ba_1?expand=customer'
 */
export function createUri(template: string | Uri, params: Params = {}): Uri {
  const remaining = normalizeParams(params);

  if (template instanceof Uri) {
    return remaining.size > 0 ? template.withQuery(buildQuery(remaining)) : template;
  }

  let result = template;
  for (const placeholder of new Set(template.match(PLACEHOLDER))) {
    const name = placeholder.slice(1, -1);
    const value = remaining.get(name);
    if (value === undefined || !isScalar(value)) {
      continue;
    }

    result = result.replaceAll(placeholder, String(value));
    remaining.delete(name);
  }

  const query = buildQuery(remaining);
  if (query) {
    result += `${result.includes('?') ? '&' : '?'}${query}`;
  }

  return Uri.parse(result);
}
