export { Collection, type CollectionMeta, isCollectionOf } from './collection.js';
export { type Attributes, Entity, type EntityClass } from './entity.js';
export { expectCollection, expectEntity } from './expect.js';
export { type Resource, ResourceFactory } from './factory.js';
export { findLink, type Link, parseLinks } from './links.js';
export { Paginator } from './paginator.js';
export { type RouteKind, type RouteMatch, Schema, splitPath } from './schema.js';
export { Service } from './service.js';
export type { RestClient } from './types.js';
