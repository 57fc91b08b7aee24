import { describe, expect, it } from 'vitest';
import { Client } from '../core/client.js';
import { ApiTracking } from '../entities/apiTracking.js';
import { CheckoutPage } from '../entities/checkoutPage.js';
import { LeadSource } from '../entities/leadSource.js';
import { Organization } from '../entities/organization.js';
import { Website } from '../entities/website.js';
import { UnprocessableEntityError } from '../error/unprocessableEntityError.js';
import { MockTransport } from '../transport/mockTransport.js';
import { ApiResponse } from '../transport/response.js';
import { ApiTrackingService } from './apiTrackingService.js';
import { CheckoutPageService } from './checkoutPageService.js';
import { LeadSourceService } from './leadSourceService.js';
import { OrganizationService } from './organizationService.js';
import { WebsiteService } from './websiteService.js';

function setup() {
  const transport = new MockTransport();
  const client = new Client({ apiKey: 'test-secret', baseUrl: 'https://api.example.com', transport });
  return { transport, client };
}

describe('OrganizationService', () => {
  it('runs the CRUD verbs against organizations', async () => {
    const { transport, client } = setup();
    const service = new OrganizationService(client);
    transport
      .on('GET', '/v2.1/organizations', ApiResponse.json({ items: [{ id: 'org_1' }], total: 1, offset: 0, limit: 10 }))
      .on('GET', '/v2.1/organizations/org_1', ApiResponse.json({ id: 'org_1', name: 'Acme' }))
      .on('POST', '/v2.1/organizations', ApiResponse.json({ id: 'org_2' }, { status: 201 }))
      .on('PUT', '/v2.1/organizations/org_1', (request) => ApiResponse.json(JSON.parse(request.body ?? '{}')))
      .on('DELETE', '/v2.1/organizations/org_1', new ApiResponse({ status: 204 }));

    const page = await service.search({ limit: 10 });
    expect(page.total).toBe(1);
    expect(page.items[0]).toBeInstanceOf(Organization);

    expect((await service.load('org_1')).name).toBe('Acme');
    expect((await service.create({ name: 'Beta' })).id).toBe('org_2');
    expect((await service.update('org_1', { id: 'org_1', name: 'Acme 2' })).name).toBe('Acme 2');
    expect(await service.delete('org_1')).toBeUndefined();

    expect(transport.requests.map(({ method }) => method)).toEqual(['GET', 'GET', 'POST', 'PUT', 'DELETE']);
  });
});

describe('WebsiteService', () => {
  it('updates with PUT and creates at an id', async () => {
    const { transport, client } = setup();
    const service = new WebsiteService(client);
    transport.on('PUT', /\/v2\.1\/websites\/w\d$/, (request) => ApiResponse.json(JSON.parse(request.body ?? '{}')));

    const created = await service.create(new Website({ name: 'Main' }), 'w1');
    const updated = await service.update('w2', { name: 'Other' });

    expect(created).toBeInstanceOf(Website);
    expect(created.name).toBe('Main');
    expect(updated.name).toBe('Other');
    expect(transport.requests.map(({ uri }) => uri.path)).toEqual(['/v2.1/websites/w1', '/v2.1/websites/w2']);
  });

  it('surfaces field errors on create', async () => {
    const { transport, client } = setup();
    transport.on(
      'POST',
      '/v2.1/websites',
      ApiResponse.json({ details: [{ field: 'url', error: 'must be a valid URL' }] }, { status: 422 }),
    );

    const err = await new WebsiteService(client).create({ url: 'nope' }).catch((error: unknown) => error);

    expect(err).toBeInstanceOf(UnprocessableEntityError);
    expect(err instanceof UnprocessableEntityError && err.details).toEqual([{ field: 'url', error: 'must be a valid URL' }]);
  });
});

describe('LeadSourceService', () => {
  it('loads and creates lead sources', async () => {
    const { transport, client } = setup();
    const service = new LeadSourceService(client);
    transport
      .on('GET', '/v2.1/lead-sources/ls_1', ApiResponse.json({ id: 'ls_1', campaign: 'spring' }))
      .on('PUT', '/v2.1/lead-sources/ls_2', ApiResponse.json({ id: 'ls_2' }));

    const loaded = await service.load('ls_1');
    expect(loaded).toBeInstanceOf(LeadSource);
    expect(loaded.campaign).toBe('spring');
    expect((await service.create({ source: 'newsletter' }, 'ls_2')).id).toBe('ls_2');
  });
});

describe('CheckoutPageService', () => {
  it('pages and updates checkout pages', async () => {
    const { transport, client } = setup();
    const service = new CheckoutPageService(client);
    transport
      .on('GET', '/v2.1/checkout-pages', ApiResponse.json({ items: [{ id: 'cp_1' }, { id: 'cp_2' }], total: 2 }))
      .on('PUT', '/v2.1/checkout-pages/cp_1', ApiResponse.json({ id: 'cp_1', isActive: false }));

    const pages = await service.paginator({ limit: 2 }).all();
    expect(pages.map((page) => page.id)).toEqual(['cp_1', 'cp_2']);
    expect(pages[0]).toBeInstanceOf(CheckoutPage);
    expect(transport.requests).toHaveLength(1);

    expect((await service.update('cp_1', { isActive: false })).isActive).toBe(false);
  });
});

describe('ApiTrackingService', () => {
  it('searches and loads tracking records', async () => {
    const { transport, client } = setup();
    const service = new ApiTrackingService(client);
    transport
      .on('GET', '/v2.1/tracking/api', ApiResponse.json([{ id: 'trk_1', status: 200 }]))
      .on(
        'GET',
        '/v2.1/tracking/api/trk_1',
        ApiResponse.json({ id: 'trk_1', _embedded: { user: { email: 'ops@example.com' } } }),
      );

    const records = await service.search();
    expect(records.items[0]).toBeInstanceOf(ApiTracking);
    expect(records.items[0].status).toBe(200);

    expect((await service.load('trk_1')).user?.email).toBe('ops@example.com');
  });
});
