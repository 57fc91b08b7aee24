import { Website } from '../entities/website.js';
import type { Collection } from '../rest/collection.js';
import { expectCollection, expectEntity } from '../rest/expect.js';
import { Paginator } from '../rest/paginator.js';
import { Service } from '../rest/service.js';
import type { Params } from '../utils/createUri.js';
import type { Payload } from '../utils/serializePayload.js';

export class WebsiteService extends Service {
  paginator(params: Params = {}): Paginator<Website> {
    return new Paginator(this.client(), 'websites', Website, params);
  }

  async search(params: Params = {}): Promise<Collection<Website>> {
    return expectCollection(Website, await this.client().get('websites', params));
  }

  /** @throws {NotFoundError} */
  async load(websiteId: string, params: Params = {}): Promise<Website> {
    const resource = await this.client().get(
      'websites/{websiteId}',
      this.withPathParams(params, { websiteId }),
    );
    return expectEntity(Website, resource);
  }

  /** @throws {UnprocessableEntityError} */
  async create(data: Payload, websiteId?: string): Promise<Website> {
    const resource = websiteId
      ? await this.client().put(data, 'websites/{websiteId}', { websiteId })
      : await this.client().post(data, 'websites');

    return expectEntity(Website, resource);
  }

  /** Full replacement. */
  async update(websiteId: string, data: Payload): Promise<Website> {
    const resource = await this.client().put(data, 'websites/{websiteId}', { websiteId });
    return expectEntity(Website, resource);
  }

  async delete(websiteId: string): Promise<void> {
    await this.client().delete('websites/{websiteId}', { websiteId });
  }
}
