import { isRecord } from '../utils/isRecord.js';
import { findLink, type Link, parseLinks } from './links.js';

/** Raw attributes of an entity, as decoded from JSON. */
export type Attributes = Record<string, unknown>;

/** Constructor of an entity type, used by the schema and services to build typed instances. */
export type EntityClass<T extends Entity = Entity> = new (data?: Attributes) => T;

/**
 * Single API resource: an attribute bag with hypermedia links and embedded
 * sub-resources. Typed entities add accessors on top of
 * {@link Entity.getAttribute} / {@link Entity.setAttribute}.
 */
export class Entity {
  #attributes: Attributes;

  constructor(data: Attributes = {}) {
    this.#attributes = { ...data };
  }

  get id(): string | null {
    return this.getString('id');
  }

  getAttribute(name: string): unknown {
    return this.#attributes[name];
  }

  setAttribute(name: string, value: unknown): this {
    this.#attributes[name] = value;
    return this;
  }

  /** Links from `_links`, in either list or HAL form. */
  get links(): Link[] {
    return parseLinks(this.#attributes._links);
  }

  getLink(rel: string): string | null {
    return findLink(this.links, rel);
  }

  hasEmbeddedResource(name: string): boolean {
    return this.getEmbeddedResource(name) !== null;
  }

  /** Raw data of an embedded resource, or `null` when not embedded. */
  getEmbeddedResource(name: string): Attributes | null {
    const embedded = this.#attributes._embedded;
    if (!isRecord(embedded)) {
      return null;
    }

    const resource = embedded[name];
    return isRecord(resource) ? resource : null;
  }

  /**
   * Wraps an embedded resource in `Type`. A new instance on every call.
   * @example
   * const user = tracking.embedded('user', TrackingUser);
   */
  embedded<T extends Entity>(name: string, Type: EntityClass<T>): T | null {
    const data = this.getEmbeddedResource(name);
    return data ? new Type(data) : null;
  }

  /** Attributes without `_links` and `_embedded`, as sent back to the API. */
  toJSON(): Attributes {
    const { _links, _embedded, ...attributes } = this.#attributes;
    return attributes;
  }

  protected getString(name: string): string | null {
    const value = this.#attributes[name];
    return typeof value === 'string' ? value : null;
  }

  protected getNumber(name: string): number | null {
    const value = this.#attributes[name];
    return typeof value === 'number' ? value : null;
  }

  protected getBoolean(name: string): boolean | null {
    const value = this.#attributes[name];
    return typeof value === 'boolean' ? value : null;
  }
}
