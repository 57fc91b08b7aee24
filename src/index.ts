/**
 * Root entrypoint for payrest: the client, services, entities, middleware,
 * transports and error utilities from a single module surface.
 * @module
 */

/** API client and the default client registry. */
export { Client } from './core/client.js';
export { getDefaultClient, initDefaultClient, resetDefaultClient } from './core/registry.js';

/** Client options, defaults and environment loading. */
export {
  BASE_HOST,
  type ClientOptions,
  type Configuration,
  ConfigurationSchema,
  CURRENT_VERSION,
  loadConfiguration,
  SANDBOX_HOST,
} from './config/index.js';

/** Typed resources of the API. */
export * from './entities/index.js';

/** Per-resource services. */
export * from './services/index.js';

/** Resource model and path schema. */
export {
  type Attributes,
  Collection,
  Entity,
  type EntityClass,
  Paginator,
  type Resource,
  ResourceFactory,
  Schema,
  Service,
} from './rest/index.js';
export { createApiSchema } from './api/schema.js';

/** Request pipeline links. */
export * from './middleware/index.js';

/** Transports and request/response types. */
export * from './transport/index.js';

/** Typed errors and their guards. */
export * from './error/index.js';

/** URI helpers. */
export { createUri, type ParamValue, type Params } from './utils/createUri.js';
export type { Payload } from './utils/serializePayload.js';
export { Uri } from './utils/uri.js';
