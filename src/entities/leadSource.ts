import { Entity } from '../rest/entity.js';

/** Marketing attribution of a customer or payment (UTM-style fields). */
export class LeadSource extends Entity {
  get medium(): string | null {
    return this.getString('medium');
  }

  set medium(value: string | null) {
    this.setAttribute('medium', value);
  }

  get source(): string | null {
    return this.getString('source');
  }

  set source(value: string | null) {
    this.setAttribute('source', value);
  }

  get campaign(): string | null {
    return this.getString('campaign');
  }

  set campaign(value: string | null) {
    this.setAttribute('campaign', value);
  }

  get term(): string | null {
    return this.getString('term');
  }

  set term(value: string | null) {
    this.setAttribute('term', value);
  }

  get content(): string | null {
    return this.getString('content');
  }

  set content(value: string | null) {
    this.setAttribute('content', value);
  }

  get affiliate(): string | null {
    return this.getString('affiliate');
  }

  set affiliate(value: string | null) {
    this.setAttribute('affiliate', value);
  }

  get clickId(): string | null {
    return this.getString('clickId');
  }

  set clickId(value: string | null) {
    this.setAttribute('clickId', value);
  }

  get createdTime(): string | null {
    return this.getString('createdTime');
  }
}
