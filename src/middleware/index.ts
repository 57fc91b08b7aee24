export { ApiKeyAuthentication } from './apiKeyAuthentication.js';
export { BaseUriMiddleware } from './baseUri.js';
export { MiddlewareChain } from './chain.js';
export { type HistoryEntry, HistoryMiddleware } from './history.js';
export { LoggerMiddleware, type RequestLogEntry } from './logger.js';
export type { Handler, Middleware } from './types.js';
