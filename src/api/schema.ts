import { ApiTracking } from '../entities/apiTracking.js';
import { BankAccount } from '../entities/bankAccount.js';
import { CheckoutPage } from '../entities/checkoutPage.js';
import { LeadSource } from '../entities/leadSource.js';
import { Organization } from '../entities/organization.js';
import { Website } from '../entities/website.js';
import { Schema } from '../rest/schema.js';

/** Route table of the shipped resources. */
export function createApiSchema(): Schema {
  return new Schema()
    .collection('bank-accounts', BankAccount)
    .entity('bank-accounts/{bankAccountId}', BankAccount)
    .entity('bank-accounts/{bankAccountId}/deactivation', BankAccount)
    .collection('organizations', Organization)
    .entity('organizations/{organizationId}', Organization)
    .collection('websites', Website)
    .entity('websites/{websiteId}', Website)
    .collection('lead-sources', LeadSource)
    .entity('lead-sources/{leadSourceId}', LeadSource)
    .collection('checkout-pages', CheckoutPage)
    .entity('checkout-pages/{checkoutPageId}', CheckoutPage)
    .collection('tracking/api', ApiTracking)
    .entity('tracking/api/{apiTrackingId}', ApiTracking);
}
