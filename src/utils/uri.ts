// RFC 3986, appendix B
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/;

/** Components of a URI reference; absent parts are empty strings. */
export interface UriParts {
  scheme: string;
  authority: string;
  path: string;
  query: string;
  fragment: string;
}

/**
 * Immutable URI reference. Works for absolute URLs as well as the relative
 * paths the services hand to the client (`bank-accounts/abc`).
 */
export class Uri {
  readonly scheme: string;
  readonly authority: string;
  readonly path: string;
  readonly query: string;
  readonly fragment: string;

  constructor(parts: Partial<UriParts> = {}) {
    this.scheme = parts.scheme ?? '';
    this.authority = parts.authority ?? '';
    this.path = parts.path ?? '';
    this.query = parts.query ?? '';
    this.fragment = parts.fragment ?? '';
  }

  /** Splits a URI string into its components. Never throws. */
  static parse(value: string): Uri {
    const [, scheme, authority, path, query, fragment] = URI_PATTERN.exec(value) ?? [];
    return new Uri({ scheme, authority, path, query, fragment });
  }

  /** Copy with another path. */
  withPath(path: string): Uri {
    return new Uri({ ...this.#parts(), path });
  }

  /** Copy with another query string (without the leading `?`). */
  withQuery(query: string): Uri {
    return new Uri({ ...this.#parts(), query });
  }

  /** Whether the URI carries a scheme, i.e. can be sent as-is. */
  isAbsolute(): boolean {
    return this.scheme !== '';
  }

  toString(): string {
    let result = '';
    if (this.scheme) {
      result += `${this.scheme}:`;
    }
    if (this.authority) {
      result += `//${this.authority}`;
    }
    result += this.path;
    if (this.query) {
      result += `?${this.query}`;
    }
    if (this.fragment) {
      result += `#${this.fragment}`;
    }
    return result;
  }

  #parts(): UriParts {
    return {
      scheme: this.scheme,
      authority: this.authority,
      path: this.path,
      query: this.query,
      fragment: this.fragment,
    };
  }
}
