import { Uri } from '../utils/uri.js';
import type { Entity, EntityClass } from './entity.js';

/** What a path resolves to: a single entity or a collection of them. */
export type RouteKind = 'entity' | 'collection';

/** Result of {@link Schema.match}. */
export interface RouteMatch {
  kind: RouteKind;
  type: EntityClass;
  pattern: string;
}

interface Route extends RouteMatch {
  segments: string[];
  literals: number;
}

const VERSION_SEGMENT = /^v\d+(\.\d+)*$/;
const WILDCARD_SEGMENT = /^(\*|\{\w+\})$/;

/**
 * Splits a path (or URI) into segments, dropping a leading API version segment.
 * @example
 * splitPath('/v2.1/bank-accounts/ba_1'); // => ['bank-accounts', 'ba_1']
 * splitPath('websites/v2'); // => ['websites', 'v2']
 */
export function splitPath(path: string): string[] {
  const segments = Uri.parse(path).path.split('/').filter(Boolean);
  const [first = '', ...rest] = segments;

  return VERSION_SEGMENT.test(first) ? rest : segments;
}

/**
 * Maps URL shapes to entity types.
 *
 * Patterns are matched segment by segment against paths of the same length.
 * `*` and `{name}` match any single segment. The pattern with the most
 * literal segments wins; ties go to the one registered first.
 */
export class Schema {
  #routes: Route[] = [];

  /** Registers an item path, e.g. `bank-accounts/{id}`. */
  entity<T extends Entity>(pattern: string, type: EntityClass<T>): this {
    return this.#add('entity', pattern, type);
  }

  /** Registers a collection path, e.g. `bank-accounts`, with its item type. */
  collection<T extends Entity>(pattern: string, type: EntityClass<T>): this {
    return this.#add('collection', pattern, type);
  }

  match(path: string): RouteMatch | null {
    const segments = splitPath(path);
    if (segments.length === 0) {
      return null;
    }

    let best: Route | null = null;
    for (const route of this.#routes) {
      if (route.segments.length !== segments.length) {
        continue;
      }

      const matches = route.segments.every(
        (segment, index) => WILDCARD_SEGMENT.test(segment) || segment === segments[index],
      );
      if (matches && (best === null || route.literals > best.literals)) {
        best = route;
      }
    }

    return best && { kind: best.kind, type: best.type, pattern: best.pattern };
  }

  #add(kind: RouteKind, pattern: string, type: EntityClass): this {
    const segments = splitPath(pattern);
    const literals = segments.filter((segment) => !WILDCARD_SEGMENT.test(segment)).length;

    this.#routes.push({ kind, type, pattern, segments, literals });
    return this;
  }
}
