import { LeadSource } from '../entities/leadSource.js';
import type { Collection } from '../rest/collection.js';
import { expectCollection, expectEntity } from '../rest/expect.js';
import { Paginator } from '../rest/paginator.js';
import { Service } from '../rest/service.js';
import type { Params } from '../utils/createUri.js';
import type { Payload } from '../utils/serializePayload.js';

export class LeadSourceService extends Service {
  paginator(params: Params = {}): Paginator<LeadSource> {
    return new Paginator(this.client(), 'lead-sources', LeadSource, params);
  }

  async search(params: Params = {}): Promise<Collection<LeadSource>> {
    return expectCollection(LeadSource, await this.client().get('lead-sources', params));
  }

  /** @throws {NotFoundError} */
  async load(leadSourceId: string, params: Params = {}): Promise<LeadSource> {
    const resource = await this.client().get('lead-sources/{leadSourceId}', this.withPathParams(params, { leadSourceId }));
    return expectEntity(LeadSource, resource);
  }

  /** @throws {UnprocessableEntityError} */
  async create(data: Payload, leadSourceId?: string): Promise<LeadSource> {
    const resource = leadSourceId
      ? await this.client().put(data, 'lead-sources/{leadSourceId}', { leadSourceId })
      : await this.client().post(data, 'lead-sources');

    return expectEntity(LeadSource, resource);
  }
}
