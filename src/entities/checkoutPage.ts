import { Entity } from '../rest/entity.js';

/** Hosted payment page bound to a plan and website. */
export class CheckoutPage extends Entity {
  get name(): string | null {
    return this.getString('name');
  }

  set name(value: string | null) {
    this.setAttribute('name', value);
  }

  /** Path segment the page is served under. */
  get uriPath(): string | null {
    return this.getString('uriPath');
  }

  set uriPath(value: string | null) {
    this.setAttribute('uriPath', value);
  }

  get planId(): string | null {
    return this.getString('planId');
  }

  set planId(value: string | null) {
    this.setAttribute('planId', value);
  }

  get websiteId(): string | null {
    return this.getString('websiteId');
  }

  set websiteId(value: string | null) {
    this.setAttribute('websiteId', value);
  }

  get redirectUrl(): string | null {
    return this.getString('redirectUrl');
  }

  set redirectUrl(value: string | null) {
    this.setAttribute('redirectUrl', value);
  }

  /** Seconds before redirecting after a successful payment. */
  get redirectTimeout(): number | null {
    return this.getNumber('redirectTimeout');
  }

  set redirectTimeout(value: number | null) {
    this.setAttribute('redirectTimeout', value);
  }

  get isActive(): boolean | null {
    return this.getBoolean('isActive');
  }

  set isActive(value: boolean | null) {
    this.setAttribute('isActive', value);
  }

  get allowCustomCustomerId(): boolean | null {
    return this.getBoolean('allowCustomCustomerId');
  }

  set allowCustomCustomerId(value: boolean | null) {
    this.setAttribute('allowCustomCustomerId', value);
  }

  get createdTime(): string | null {
    return this.getString('createdTime');
  }
}
