import type { Logger } from 'pino';
import type { ApiRequest } from '../transport/request.js';
import { safeWrapAsync } from '../utils/wrap.js';
import type { Handler, Middleware } from './types.js';

/** Fields of the per-request log record. */
export interface RequestLogEntry {
  readonly method: string;
  readonly uri: string;
  readonly status: number;
  readonly durationMs: number;
}

/**
 * Structured request logging with pino.
 *
 * One `info` record per completed request, one `error` record when the rest
 * of the pipeline rejects (the error is rethrown). Headers are never logged,
 * so the API key stays out of the output.
 */
export class LoggerMiddleware implements Middleware {
  #logger: Logger;

  constructor(logger: Logger) {
    this.#logger = logger;
  }

  async handle(request: ApiRequest, next: Handler) {
    const start = Date.now();
    const method = request.method;
    const uri = request.uri.toString();

    const [err, response] = await safeWrapAsync(() => next(request));
    const durationMs = Date.now() - start;

    if (err) {
      this.#logger.error({ method, uri, durationMs, err }, 'request failed');
      throw err;
    }

    const entry: RequestLogEntry = { method, uri, status: response.status, durationMs };
    this.#logger.info(entry, 'request completed');

    return response;
  }
}
