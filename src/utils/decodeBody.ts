import { ResponseDecodeError } from '../error/responseDecodeError.js';
import type { ApiResponse } from '../transport/response.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Decodes a response body as JSON.
 *
 * - An empty (or whitespace-only) body decodes to `{}`.
 * - Anything else must be valid JSON, otherwise a {@link ResponseDecodeError}
 *   is returned with the parse failure as `cause`.
 */
export function decodeBody(response: ApiResponse): SafeWrap<ResponseDecodeError, unknown> {
  const text = response.body;
  if (!text.trim()) {
    return [null, {}];
  }

  const [errJson, json] = safeWrap<Error, unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new ResponseDecodeError('error parsing json response body', text, { cause: errJson }), null];
  }

  return [null, json];
}
