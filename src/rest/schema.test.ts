import { describe, expect, it } from 'vitest';
import { Entity } from './entity.js';
import { Schema, splitPath } from './schema.js';

class Account extends Entity {}
class Deactivation extends Entity {}
class Note extends Entity {}

describe('splitPath', () => {
  it.each([
    ['/v2.1/bank-accounts/ba_1', ['bank-accounts', 'ba_1']],
    ['bank-accounts', ['bank-accounts']],
    ['https://api.example.com/v2/bank-accounts?limit=1', ['bank-accounts']],
    ['/proxy/v2.1/websites/', ['proxy', 'v2.1', 'websites']],
    ['websites/v2', ['websites', 'v2']],
    ['/v2.1/bank-accounts/v1', ['bank-accounts', 'v1']],
    ['', []],
  ])('splits %s', (path, expected) => {
    expect(splitPath(path)).toEqual(expected);
  });
});

describe('Schema', () => {
  const schema = new Schema()
    .collection('accounts', Account)
    .entity('accounts/{accountId}', Account)
    .entity('accounts/*/deactivation', Deactivation)
    .entity('accounts/{accountId}/{sub}', Note)
    .entity('accounts/notes', Note);

  it('matches collections and items', () => {
    expect(schema.match('/v2.1/accounts')).toEqual({ kind: 'collection', type: Account, pattern: 'accounts' });
    expect(schema.match('/v2.1/accounts/a1')).toMatchObject({ kind: 'entity', type: Account });
  });

  it('prefers the pattern with more literal segments', () => {
    expect(schema.match('accounts/a1/deactivation')?.type).toBe(Deactivation);
    expect(schema.match('accounts/a1/other')?.type).toBe(Note);
    expect(schema.match('accounts/notes')?.type).toBe(Note);
  });

  it('matches ids that look like a version', () => {
    expect(schema.match('accounts/v1')).toMatchObject({ kind: 'entity', type: Account });
    expect(schema.match('/v2.1/accounts/v2.0')).toMatchObject({ kind: 'entity', type: Account });
  });

  it('keeps the first registered pattern on a tie', () => {
    const tied = new Schema().entity('things/{id}', Account).entity('things/*', Note);
    expect(tied.match('things/t1')?.type).toBe(Account);
  });

  it('returns null when nothing matches', () => {
    expect(schema.match('/v2.1/customers/c1')).toBeNull();
    expect(schema.match('/v2.1/accounts/a1/b/c')).toBeNull();
    expect(schema.match('')).toBeNull();
    expect(schema.match('/v2.1/')).toBeNull();
  });
});
