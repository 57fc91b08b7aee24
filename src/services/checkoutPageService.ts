import { CheckoutPage } from '../entities/checkoutPage.js';
import type { Collection } from '../rest/collection.js';
import { expectCollection, expectEntity } from '../rest/expect.js';
import { Paginator } from '../rest/paginator.js';
import { Service } from '../rest/service.js';
import type { Params } from '../utils/createUri.js';
import type { Payload } from '../utils/serializePayload.js';

export class CheckoutPageService extends Service {
  paginator(params: Params = {}): Paginator<CheckoutPage> {
    return new Paginator(this.client(), 'checkout-pages', CheckoutPage, params);
  }

  async search(params: Params = {}): Promise<Collection<CheckoutPage>> {
    return expectCollection(CheckoutPage, await this.client().get('checkout-pages', params));
  }

  /** @throws {NotFoundError} */
  async load(checkoutPageId: string, params: Params = {}): Promise<CheckoutPage> {
    const resource = await this.client().get(
      'checkout-pages/{checkoutPageId}',
      this.withPathParams(params, { checkoutPageId }),
    );
    return expectEntity(CheckoutPage, resource);
  }

  /** @throws {UnprocessableEntityError} */
  async create(data: Payload, checkoutPageId?: string): Promise<CheckoutPage> {
    const resource = checkoutPageId
      ? await this.client().put(data, 'checkout-pages/{checkoutPageId}', { checkoutPageId })
      : await this.client().post(data, 'checkout-pages');

    return expectEntity(CheckoutPage, resource);
  }

  async update(checkoutPageId: string, data: Payload): Promise<CheckoutPage> {
    const resource = await this.client().put(data, 'checkout-pages/{checkoutPageId}', { checkoutPageId });
    return expectEntity(CheckoutPage, resource);
  }
}
