import { describe, expect, it } from 'vitest';
import { ApiTracking } from './apiTracking.js';
import { BankAccount } from './bankAccount.js';
import { CheckoutPage } from './checkoutPage.js';
import { TrackingUser } from './trackingUser.js';
import { Website } from './website.js';

describe('ApiTracking', () => {
  const tracking = new ApiTracking({
    id: 'trk_1',
    status: 201,
    method: 'POST',
    url: 'https://api.example.com/v2.1/websites',
    duration: 42,
    _embedded: { user: { id: 'usr_1', email: 'ops@example.com', firstName: 'Ada' } },
  });

  it('exposes the tracked request', () => {
    expect([tracking.status, tracking.method, tracking.url, tracking.duration]).toEqual([
      201,
      'POST',
      'https://api.example.com/v2.1/websites',
      42,
    ]);
    expect(tracking.route).toBeNull();
  });

  it('wraps the embedded user', () => {
    expect(tracking.user).toBeInstanceOf(TrackingUser);
    expect(tracking.user?.email).toBe('ops@example.com');
    expect(tracking.user?.firstName).toBe('Ada');
    expect(tracking.user?.lastName).toBeNull();
    expect(new ApiTracking({ id: 'trk_2' }).user).toBeNull();
  });
});

describe('BankAccount', () => {
  it('narrows the account type', () => {
    expect(new BankAccount({ accountType: 'savings' }).accountType).toBe('savings');
    expect(new BankAccount({ accountType: 'brokerage' }).accountType).toBeNull();
  });

  it('writes through setters', () => {
    const account = new BankAccount();
    account.bankName = 'First Test Bank';
    account.accountType = 'checking';

    expect(account.toJSON()).toEqual({ bankName: 'First Test Bank', accountType: 'checking' });
  });
});

describe('CheckoutPage', () => {
  it('reads typed attributes', () => {
    const page = new CheckoutPage({ redirectTimeout: 5, isActive: true, allowCustomCustomerId: 'yes' });

    expect(page.redirectTimeout).toBe(5);
    expect(page.isActive).toBe(true);
    expect(page.allowCustomCustomerId).toBeNull();
  });
});

describe('Website', () => {
  it('chains attribute writes', () => {
    const website = new Website().setAttribute('name', 'Main').setAttribute('url', 'https://shop.example.com');

    expect(website.name).toBe('Main');
    expect(website.url).toBe('https://shop.example.com');
  });
});
