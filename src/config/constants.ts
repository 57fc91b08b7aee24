/** Production API host. */
export const BASE_HOST = 'https://api.payrest.dev';

/** Sandbox API host, selected by `PAYREST_SANDBOX=true`. */
export const SANDBOX_HOST = 'https://api-sandbox.payrest.dev';

/** API version segment prefixed to every relative request path. */
export const CURRENT_VERSION = 'v2.1';

export const DEFAULT_API_KEY_HEADER = 'X-API-KEY';

/** SDK identifier, used as the pino logger name. */
export const SDK_NAME = 'payrest';
