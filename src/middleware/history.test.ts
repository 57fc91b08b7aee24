import { describe, expect, it } from 'vitest';
import { ApiRequest } from '../transport/request.js';
import { ApiResponse } from '../transport/response.js';
import { HistoryMiddleware } from './history.js';

describe('HistoryMiddleware', () => {
  it('keeps the last entries up to the limit', async () => {
    const history = new HistoryMiddleware(2);

    for (const path of ['a', 'b', 'c']) {
      await history.handle(new ApiRequest('GET', path), async () => new ApiResponse({ body: path }));
    }

    expect(history.entries.map(({ request }) => request.uri.path)).toEqual(['b', 'c']);
    expect(history.last?.response?.body).toBe('c');
  });

  it('defaults to five entries', async () => {
    const history = new HistoryMiddleware();
    for (let i = 0; i < 7; i++) {
      await history.handle(new ApiRequest('GET', `p${i}`), async () => new ApiResponse());
    }

    expect(history.entries).toHaveLength(5);
    expect(history.entries[0].request.uri.path).toBe('p2');
  });

  it('records failures and rethrows', async () => {
    const history = new HistoryMiddleware();
    const failure = new Error('down');

    await expect(history.handle(new ApiRequest('GET', 'x'), () => Promise.reject(failure))).rejects.toBe(failure);
    expect(history.last).toMatchObject({ response: null, error: failure });
  });

  it('clears', async () => {
    const history = new HistoryMiddleware();
    await history.handle(new ApiRequest('GET', 'x'), async () => new ApiResponse());
    history.clear();

    expect(history.entries).toEqual([]);
    expect(history.last).toBeNull();
  });
});
