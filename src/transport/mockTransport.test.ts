import { describe, expect, it } from 'vitest';
import { TransportError } from '../error/transportError.js';
import { MockTransport } from './mockTransport.js';
import { ApiRequest } from './request.js';
import { ApiResponse } from './response.js';

const BASE = 'https://api.example.com/v2.1';

describe('MockTransport', () => {
  it('matches on method and path', async () => {
    const ok = ApiResponse.json({ id: 'w1' });
    const transport = new MockTransport().on('GET', '/v2.1/websites/w1', ok);

    expect(await transport.send(new ApiRequest('GET', `${BASE}/websites/w1?expand=x`))).toBe(ok);
    await expect(transport.send(new ApiRequest('DELETE', `${BASE}/websites/w1`))).rejects.toBeInstanceOf(
      TransportError,
    );
  });

  it('matches full URIs and regular expressions', async () => {
    const transport = new MockTransport()
      .on('GET', `${BASE}/websites?limit=1`, new ApiResponse({ status: 200, body: '[]' }))
      .on('POST', /\/organizations$/, (request) => ApiResponse.json({ echo: request.body }, { status: 201 }));

    expect((await transport.send(new ApiRequest('GET', `${BASE}/websites?limit=1`))).body).toBe('[]');

    const created = await transport.send(new ApiRequest('POST', `${BASE}/organizations`, {}, '{"name":"Acme"}'));
    expect(created.status).toBe(201);
    expect(created.body).toBe('{"echo":"{\\"name\\":\\"Acme\\"}"}');
  });

  it('uses the first matching route', async () => {
    const transport = new MockTransport()
      .on('GET', /websites/, new ApiResponse({ status: 200, body: 'first' }))
      .on('GET', /websites/, new ApiResponse({ status: 200, body: 'second' }));

    expect((await transport.send(new ApiRequest('GET', `${BASE}/websites`))).body).toBe('first');
  });

  it('records requests and resets', async () => {
    const transport = new MockTransport().on('GET', /.*/, new ApiResponse());
    const request = new ApiRequest('GET', `${BASE}/a`);

    await transport.send(request);
    expect(transport.requests).toEqual([request]);

    transport.reset();
    expect(transport.requests).toEqual([]);
    await expect(transport.send(request)).rejects.toThrow(`error no mock response for GET ${BASE}/a`);
  });
});
