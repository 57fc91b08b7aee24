import type { ApiRequest } from '../transport/request.js';
import type { Handler, Middleware } from './types.js';

/**
 * Ordered list of {@link Middleware} links, itself a link.
 *
 * The first attached link sees the request first and the response last;
 * the terminal handler passed to {@link MiddlewareChain.compose} is innermost.
 */
export class MiddlewareChain implements Middleware {
  #links: Middleware[] = [];
  /** Composed handlers of {@link MiddlewareChain.handle}, keyed by `next`; cleared on attach. */
  #composed = new WeakMap<Handler, Handler>();

  constructor(links: Iterable<Middleware> = []) {
    for (const link of links) {
      this.attach(link);
    }
  }

  /** Appends a link; it runs after every link attached before it. */
  attach(link: Middleware): this {
    this.#links.push(link);
    this.#composed = new WeakMap();
    return this;
  }

  /** Number of attached links. */
  get size(): number {
    return this.#links.length;
  }

  /** Folds the links around `terminal` into a single handler. */
  compose(terminal: Handler): Handler {
    let handler = terminal;
    for (const link of [...this.#links].reverse()) {
      const next = handler;
      handler = (request) => link.handle(request, next);
    }

    return handler;
  }

  /** Runs the chain as a link; the handler composed around `next` is reused across calls. */
  handle(request: ApiRequest, next: Handler) {
    let handler = this.#composed.get(next);
    if (!handler) {
      handler = this.compose(next);
      this.#composed.set(next, handler);
    }

    return handler(request);
  }
}
