export { ApiTrackingService } from './apiTrackingService.js';
export { BankAccountService, type BankAccountToken } from './bankAccountService.js';
export { CheckoutPageService } from './checkoutPageService.js';
export { LeadSourceService } from './leadSourceService.js';
export { OrganizationService } from './organizationService.js';
export { WebsiteService } from './websiteService.js';
