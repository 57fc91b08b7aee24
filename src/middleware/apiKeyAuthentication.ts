import { DEFAULT_API_KEY_HEADER } from '../config/constants.js';
import type { ApiRequest } from '../transport/request.js';
import type { Handler, Middleware } from './types.js';

/** Sets the API key header on every request, replacing any caller value. */
export class ApiKeyAuthentication implements Middleware {
  #apiKey: string;
  #header: string;

  constructor(apiKey: string, header = DEFAULT_API_KEY_HEADER) {
    this.#apiKey = apiKey;
    this.#header = header;
  }

  handle(request: ApiRequest, next: Handler) {
    return next(request.withHeader(this.#header, this.#apiKey));
  }
}
