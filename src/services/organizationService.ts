import { Organization } from '../entities/organization.js';
import type { Collection } from '../rest/collection.js';
import { expectCollection, expectEntity } from '../rest/expect.js';
import { Paginator } from '../rest/paginator.js';
import { Service } from '../rest/service.js';
import type { Params } from '../utils/createUri.js';
import type { Payload } from '../utils/serializePayload.js';

export class OrganizationService extends Service {
  paginator(params: Params = {}): Paginator<Organization> {
    return new Paginator(this.client(), 'organizations', Organization, params);
  }

  async search(params: Params = {}): Promise<Collection<Organization>> {
    return expectCollection(Organization, await this.client().get('organizations', params));
  }

  /** @throws {NotFoundError} */
  async load(organizationId: string, params: Params = {}): Promise<Organization> {
    const resource = await this.client().get(
      'organizations/{organizationId}',
      this.withPathParams(params, { organizationId }),
    );
    return expectEntity(Organization, resource);
  }

  /** @throws {UnprocessableEntityError} */
  async create(data: Payload, organizationId?: string): Promise<Organization> {
    const resource = organizationId
      ? await this.client().put(data, 'organizations/{organizationId}', { organizationId })
      : await this.client().post(data, 'organizations');

    return expectEntity(Organization, resource);
  }

  /** Full replacement. */
  async update(organizationId: string, data: Payload): Promise<Organization> {
    const resource = await this.client().put(data, 'organizations/{organizationId}', { organizationId });
    return expectEntity(Organization, resource);
  }

  async delete(organizationId: string): Promise<void> {
    await this.client().delete('organizations/{organizationId}', { organizationId });
  }
}
