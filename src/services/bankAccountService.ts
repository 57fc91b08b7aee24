import { BankAccount } from '../entities/bankAccount.js';
import type { Collection } from '../rest/collection.js';
import { expectCollection, expectEntity } from '../rest/expect.js';
import { Paginator } from '../rest/paginator.js';
import { Service } from '../rest/service.js';
import type { Params } from '../utils/createUri.js';
import { isRecord } from '../utils/isRecord.js';
import type { Payload } from '../utils/serializePayload.js';

/** Payment token, as its id or as the token resource itself. */
export type BankAccountToken = string | { token: string };

export class BankAccountService extends Service {
  paginator(params: Params = {}): Paginator<BankAccount> {
    return new Paginator(this.client(), 'bank-accounts', BankAccount, params);
  }

  async search(params: Params = {}): Promise<Collection<BankAccount>> {
    return expectCollection(BankAccount, await this.client().get('bank-accounts', params));
  }

  /** @throws {NotFoundError} */
  async load(bankAccountId: string, params: Params = {}): Promise<BankAccount> {
    const resource = await this.client().get(
      'bank-accounts/{bankAccountId}',
      this.withPathParams(params, { bankAccountId }),
    );
    return expectEntity(BankAccount, resource);
  }

  /**
   * Creates a bank account; with an id the account is created (or replaced) at that id.
   * @throws {UnprocessableEntityError}
   */
  async create(data: Payload, bankAccountId?: string): Promise<BankAccount> {
    const resource = bankAccountId
      ? await this.client().put(data, 'bank-accounts/{bankAccountId}', { bankAccountId })
      : await this.client().post(data, 'bank-accounts');

    return expectEntity(BankAccount, resource);
  }

  /** {@link BankAccountService.create} with the account details taken from a payment token. */
  async createFromToken(token: BankAccountToken, data: Payload, bankAccountId?: string): Promise<BankAccount> {
    const json: unknown = JSON.parse(JSON.stringify(data ?? {}));
    const attributes = isRecord(json) ? json : {};

    return this.create({ ...attributes, token: typeof token === 'string' ? token : token.token }, bankAccountId);
  }

  /** Partial update. */
  async update(bankAccountId: string, data: Payload): Promise<BankAccount> {
    const resource = await this.client().patch(data, 'bank-accounts/{bankAccountId}', { bankAccountId });
    return expectEntity(BankAccount, resource);
  }

  async deactivate(bankAccountId: string): Promise<BankAccount> {
    const resource = await this.client().post(null, 'bank-accounts/{bankAccountId}/deactivation', { bankAccountId });
    return expectEntity(BankAccount, resource);
  }
}
