import { Entity } from '../rest/entity.js';

/** User that issued a tracked API request. Read-only, only seen embedded. */
export class TrackingUser extends Entity {
  get email(): string | null {
    return this.getString('email');
  }

  get firstName(): string | null {
    return this.getString('firstName');
  }

  get lastName(): string | null {
    return this.getString('lastName');
  }
}
