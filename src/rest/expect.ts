import { UnexpectedResourceError } from '../error/unexpectedResourceError.js';
import { type Collection, isCollectionOf } from './collection.js';
import type { Entity, EntityClass } from './entity.js';

/**
 * Narrows a resolved resource to an entity of `Type`.
 * @throws {UnexpectedResourceError}
 */
export function expectEntity<T extends Entity>(Type: EntityClass<T>, resource: unknown): T {
  if (resource instanceof Type) {
    return resource;
  }

  throw new UnexpectedResourceError(Type.name, resource);
}

/**
 * Narrows a resolved resource to a collection of `Type`.
 * @throws {UnexpectedResourceError}
 */
export function expectCollection<T extends Entity>(Type: EntityClass<T>, resource: unknown): Collection<T> {
  if (isCollectionOf(resource, Type)) {
    return resource;
  }

  throw new UnexpectedResourceError(`${Type.name} collection`, resource);
}
