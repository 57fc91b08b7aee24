import { Entity } from '../rest/entity.js';

export class Website extends Entity {
  get name(): string | null {
    return this.getString('name');
  }

  set name(value: string | null) {
    this.setAttribute('name', value);
  }

  get url(): string | null {
    return this.getString('url');
  }

  set url(value: string | null) {
    this.setAttribute('url', value);
  }

  get servicePhone(): string | null {
    return this.getString('servicePhone');
  }

  set servicePhone(value: string | null) {
    this.setAttribute('servicePhone', value);
  }

  get serviceEmail(): string | null {
    return this.getString('serviceEmail');
  }

  set serviceEmail(value: string | null) {
    this.setAttribute('serviceEmail', value);
  }

  get organizationId(): string | null {
    return this.getString('organizationId');
  }

  set organizationId(value: string | null) {
    this.setAttribute('organizationId', value);
  }

  get createdTime(): string | null {
    return this.getString('createdTime');
  }
}
