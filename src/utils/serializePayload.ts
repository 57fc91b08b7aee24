/** Request payload: an object (entities serialize through `toJSON`), an array, or nothing. */
export type Payload = object | null | undefined;

/**
 * Serializes a payload to a JSON *object*. Nothing and `[]` become `{}`;
 * a top-level array becomes an index-keyed object. Nested arrays are kept.
 */
export function serializePayload(payload: Payload): string {
  if (payload === null || payload === undefined) {
    return '{}';
  }

  if (Array.isArray(payload)) {
    return JSON.stringify(Object.fromEntries(payload.entries()));
  }

  const json: unknown = JSON.parse(JSON.stringify(payload) ?? '{}');
  if (Array.isArray(json)) {
    return JSON.stringify(Object.fromEntries(json.entries()));
  }

  return typeof json === 'object' && json !== null ? JSON.stringify(json) : '{}';
}
