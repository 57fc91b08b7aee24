import { z } from 'zod';
import { isRecord } from '../utils/isRecord.js';
import { Uri } from '../utils/uri.js';
import { Collection, type CollectionMeta } from './collection.js';
import { type Attributes, Entity, type EntityClass } from './entity.js';
import { findLink, parseLinks } from './links.js';
import type { RouteMatch, Schema } from './schema.js';

/** What a successful call resolves to. */
export type Resource = Entity | Collection;

const MetaNumber = z.number().nullable().catch(null);

/** Paged list body: `items` plus at least one of `total`, `offset` and `limit`. */
const EnvelopeSchema = z
  .object({
    items: z.array(z.unknown()),
    total: MetaNumber.optional(),
    offset: MetaNumber.optional(),
    limit: MetaNumber.optional(),
  })
  .refine((body) => 'total' in body || 'offset' in body || 'limit' in body);

interface Envelope extends CollectionMeta {
  items: unknown[];
}

function toEnvelope(body: unknown): Envelope | null {
  if (Array.isArray(body)) {
    return { items: body, total: null, offset: null, limit: null };
  }

  const result = EnvelopeSchema.safeParse(body);
  if (!result.success) {
    return null;
  }

  const { items, total = null, offset = null, limit = null } = result.data;
  return { items, total, offset, limit };
}

function toAttributes(value: unknown): Attributes {
  return isRecord(value) ? value : { value };
}

/**
 * Builds resources from decoded response bodies, typed by the path they
 * came from. Never throws: anything it cannot place becomes a plain {@link Entity}.
 */
export class ResourceFactory {
  #schema: Schema;

  constructor(schema: Schema) {
    this.#schema = schema;
  }

  create(path: string, body: unknown): Resource {
    const route = this.#schema.match(path);

    if (Array.isArray(body) || route === null || route.kind === 'collection') {
      const envelope = toEnvelope(body);
      if (envelope) {
        const { items, ...meta } = envelope;
        return new Collection(
          items.map((item) => this.#item(item, route)),
          meta,
        );
      }
    }

    return this.#entity(route?.type ?? Entity, body);
  }

  #item(item: unknown, route: RouteMatch | null): Entity {
    const self = isRecord(item) ? findLink(parseLinks(item._links), 'self') : null;
    const own = self === null ? null : this.#schema.match(Uri.parse(self).path);

    return this.#entity(own?.kind === 'entity' ? own.type : (route?.type ?? Entity), item);
  }

  #entity(Type: EntityClass, body: unknown): Entity {
    return new Type(toAttributes(body));
  }
}
