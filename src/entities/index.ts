export { ApiTracking } from './apiTracking.js';
export { BankAccount, type BankAccountType } from './bankAccount.js';
export { CheckoutPage } from './checkoutPage.js';
export { LeadSource } from './leadSource.js';
export { Organization } from './organization.js';
export { TrackingUser } from './trackingUser.js';
export { Website } from './website.js';
