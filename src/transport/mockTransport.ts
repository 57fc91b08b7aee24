import { TransportError } from '../error/transportError.js';
import type { ApiRequest } from './request.js';
import type { ApiResponse } from './response.js';
import type { HttpMethod, Transport } from './types.js';

/** Canned reply: a response, or a function building one from the request. */
export type MockReply = ApiResponse | ((request: ApiRequest) => ApiResponse | Promise<ApiResponse>);

interface MockRoute {
  method: HttpMethod;
  target: string | RegExp;
  reply: MockReply;
}

/**
 * In-process {@link Transport} returning canned responses keyed by method and
 * URI, for tests and offline development.
 *
 * A string target matches the request path (`/v2.1/websites`) or the full URI;
 * a RegExp is tested against the full URI. Routes are checked in registration
 * order. Every request is recorded in {@link MockTransport.requests}.
 */
export class MockTransport implements Transport {
  #routes: MockRoute[] = [];
  #requests: ApiRequest[] = [];

  /** Registers a reply for `method` + `target`. */
  on(method: HttpMethod, target: string | RegExp, reply: MockReply): this {
    this.#routes.push({ method, target, reply });
    return this;
  }

  /** Requests received so far, oldest first. */
  get requests(): readonly ApiRequest[] {
    return this.#requests;
  }

  /** Forgets routes and recorded requests. */
  reset() {
    this.#routes = [];
    this.#requests = [];
  }

  async send(request: ApiRequest): Promise<ApiResponse> {
    this.#requests.push(request);

    const uri = request.uri.toString();
    const route = this.#routes.find(({ method, target }) => {
      if (method !== request.method) {
        return false;
      }

      return typeof target === 'string' ? target === request.uri.path || target === uri : target.test(uri);
    });

    if (!route) {
      throw new TransportError(`error no mock response for ${request.method} ${uri}`, request);
    }

    return typeof route.reply === 'function' ? route.reply(request) : route.reply;
  }
}
