import { Entity } from '../rest/entity.js';

/** Kind of bank account. */
export type BankAccountType = 'checking' | 'savings' | 'other';

/** Bank account of a customer, used for ACH payments. */
export class BankAccount extends Entity {
  get customerId(): string | null {
    return this.getString('customerId');
  }

  set customerId(value: string | null) {
    this.setAttribute('customerId', value);
  }

  get bankName(): string | null {
    return this.getString('bankName');
  }

  set bankName(value: string | null) {
    this.setAttribute('bankName', value);
  }

  get routingNumber(): string | null {
    return this.getString('routingNumber');
  }

  set routingNumber(value: string | null) {
    this.setAttribute('routingNumber', value);
  }

  get accountType(): BankAccountType | null {
    const value = this.getString('accountType');
    return value === 'checking' || value === 'savings' || value === 'other' ? value : null;
  }

  set accountType(value: BankAccountType | null) {
    this.setAttribute('accountType', value);
  }

  /** Last four digits; the full number is never returned. */
  get last4(): string | null {
    return this.getString('last4');
  }

  /** `active` or `inactive` once deactivated. */
  get status(): string | null {
    return this.getString('status');
  }

  get createdTime(): string | null {
    return this.getString('createdTime');
  }

  get updatedTime(): string | null {
    return this.getString('updatedTime');
  }
}
