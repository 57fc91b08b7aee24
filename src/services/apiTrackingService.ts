import { ApiTracking } from '../entities/apiTracking.js';
import type { Collection } from '../rest/collection.js';
import { expectCollection, expectEntity } from '../rest/expect.js';
import { Paginator } from '../rest/paginator.js';
import { Service } from '../rest/service.js';
import type { Params } from '../utils/createUri.js';

/** Read-only access to the API request log. */
export class ApiTrackingService extends Service {
  paginator(params: Params = {}): Paginator<ApiTracking> {
    return new Paginator(this.client(), 'tracking/api', ApiTracking, params);
  }

  async search(params: Params = {}): Promise<Collection<ApiTracking>> {
    return expectCollection(ApiTracking, await this.client().get('tracking/api', params));
  }

  /** @throws {NotFoundError} */
  async load(apiTrackingId: string, params: Params = {}): Promise<ApiTracking> {
    const resource = await this.client().get(
      'tracking/api/{apiTrackingId}',
      this.withPathParams(params, { apiTrackingId }),
    );
    return expectEntity(ApiTracking, resource);
  }
}
