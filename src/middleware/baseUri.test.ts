import { describe, expect, it } from 'vitest';
import { ApiRequest } from '../transport/request.js';
import { ApiResponse } from '../transport/response.js';
import { Uri } from '../utils/uri.js';
import { BaseUriMiddleware } from './baseUri.js';

describe('BaseUriMiddleware', () => {
  const middleware = new BaseUriMiddleware('https://api.example.com', 'v2.1');

  it('builds the base from host and version', () => {
    expect(middleware.base.toString()).toBe('https://api.example.com/v2.1/');
    expect(new BaseUriMiddleware('https://api.example.com/proxy/', 'v2.1').base.toString()).toBe(
      'https://api.example.com/proxy/v2.1/',
    );
  });

  it.each([
    ['bank-accounts/ba_1', 'https://api.example.com/v2.1/bank-accounts/ba_1'],
    ['websites?limit=10&offset=0', 'https://api.example.com/v2.1/websites?limit=10&offset=0'],
    ['/v2.1/bank-accounts/ba_1', 'https://api.example.com/v2.1/bank-accounts/ba_1'],
    ['/websites', 'https://api.example.com/v2.1/websites'],
    ['https://other.example.com/x?y=1', 'https://other.example.com/x?y=1'],
  ])('resolves %s', (input, expected) => {
    expect(middleware.resolve(Uri.parse(input)).toString()).toBe(expected);
  });

  it.each([
    ['websites/v2', 'websites/v2'],
    ['/v2.1/bank-accounts/v1', 'bank-accounts/v1'],
    ['/websites', 'websites'],
    ['https://api.example.com/v2.1/websites/w1?x=1', 'websites/w1'],
    ['https://other.example.com/x', '/x'],
  ])('gives the path of %s relative to the base', (input, expected) => {
    expect(middleware.relativePath(Uri.parse(input))).toBe(expected);
  });

  it('strips a base path prefix', () => {
    const proxied = new BaseUriMiddleware('https://api.example.com/proxy', 'v2.1');
    expect(proxied.relativePath(Uri.parse('https://api.example.com/proxy/v2.1/websites/v1'))).toBe('websites/v1');
  });

  it('forwards the resolved request', async () => {
    let seen = '';
    await middleware.handle(new ApiRequest('GET', 'organizations'), async (request) => {
      seen = request.uri.toString();
      return new ApiResponse();
    });

    expect(seen).toBe('https://api.example.com/v2.1/organizations');
  });
});
