import { Entity } from '../rest/entity.js';

export class Organization extends Entity {
  get name(): string | null {
    return this.getString('name');
  }

  set name(value: string | null) {
    this.setAttribute('name', value);
  }

  get address(): string | null {
    return this.getString('address');
  }

  set address(value: string | null) {
    this.setAttribute('address', value);
  }

  get city(): string | null {
    return this.getString('city');
  }

  set city(value: string | null) {
    this.setAttribute('city', value);
  }

  get region(): string | null {
    return this.getString('region');
  }

  set region(value: string | null) {
    this.setAttribute('region', value);
  }

  /** ISO 3166-1 alpha-2 code. */
  get country(): string | null {
    return this.getString('country');
  }

  set country(value: string | null) {
    this.setAttribute('country', value);
  }

  get postalCode(): string | null {
    return this.getString('postalCode');
  }

  set postalCode(value: string | null) {
    this.setAttribute('postalCode', value);
  }

  get createdTime(): string | null {
    return this.getString('createdTime');
  }
}
