import { Entity } from '../rest/entity.js';
import { TrackingUser } from './trackingUser.js';

/** Log record of one API request made against the account. Read-only. */
export class ApiTracking extends Entity {
  /** HTTP status of the tracked response. */
  get status(): number | null {
    return this.getNumber('status');
  }

  get url(): string | null {
    return this.getString('url');
  }

  get route(): string | null {
    return this.getString('route');
  }

  get method(): string | null {
    return this.getString('method');
  }

  /** Raw request body. */
  get request(): string | null {
    return this.getString('request');
  }

  /** Raw response body. */
  get response(): string | null {
    return this.getString('response');
  }

  /** Embedded `user`, wrapped on access. */
  get user(): TrackingUser | null {
    return this.embedded('user', TrackingUser);
  }

  /** Milliseconds. */
  get duration(): number | null {
    return this.getNumber('duration');
  }

  get createdTime(): string | null {
    return this.getString('createdTime');
  }
}
