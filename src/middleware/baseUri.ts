import type { ApiRequest } from '../transport/request.js';
import { Uri } from '../utils/uri.js';
import type { Handler, Middleware } from './types.js';

/**
 * Resolves relative request URIs against `{baseUrl}/{version}/`.
 *
 * `bank-accounts/1` and `/v2.1/bank-accounts/1` both end up at
 * `{baseUrl}/v2.1/bank-accounts/1`; a leading slash without the version
 * prefix is treated as relative to it. Absolute URIs pass through.
 */
export class BaseUriMiddleware implements Middleware {
  #base: Uri;

  constructor(baseUrl: string, version: string) {
    const root = Uri.parse(baseUrl);
    const basePath = `${root.path.replace(/\/+$/, '')}/${version}/`;
    this.#base = root.withPath(basePath).withQuery('');
  }

  /** Absolute base every relative request is resolved against, with a trailing slash. */
  get base(): Uri {
    return this.#base;
  }

  resolve(uri: Uri): Uri {
    if (uri.isAbsolute()) {
      return uri;
    }

    const basePath = this.#base.path;
    const path = uri.path.startsWith(basePath) ? uri.path : `${basePath}${uri.path.replace(/^\/+/, '')}`;

    return new Uri({
      scheme: this.#base.scheme,
      authority: this.#base.authority,
      path,
      query: uri.query,
      fragment: uri.fragment,
    });
  }

  /**
   * Path of `uri` relative to the base, e.g. `bank-accounts/ba_1` for
   * `/v2.1/bank-accounts/ba_1`. Paths outside the base are returned as-is.
   */
  relativePath(uri: Uri): string {
    const path = this.resolve(uri).path;
    const basePath = this.#base.path;

    return path.startsWith(basePath) ? path.slice(basePath.length) : path;
  }

  handle(request: ApiRequest, next: Handler) {
    return next(request.withUri(this.resolve(request.uri)));
  }
}
