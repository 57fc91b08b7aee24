import { describe, expect, it, vi } from 'vitest';
import { ApiRequest } from '../transport/request.js';
import { ApiResponse } from '../transport/response.js';
import { MiddlewareChain } from './chain.js';
import type { Handler, Middleware } from './types.js';

function tracing(name: string, trace: string[]): Middleware {
  return {
    async handle(request, next) {
      trace.push(`${name}:before`);
      const response = await next(request.withHeader('X-Trace', `${request.header('X-Trace') ?? ''}${name}`));
      trace.push(`${name}:after`);
      return response;
    },
  };
}

describe('MiddlewareChain', () => {
  it('runs links in attach order around the terminal', async () => {
    const trace: string[] = [];
    const terminal = vi.fn<Handler>(async (request) => {
      trace.push('terminal');
      return new ApiResponse({ body: request.header('X-Trace') ?? '' });
    });

    const chain = new MiddlewareChain().attach(tracing('A', trace)).attach(tracing('B', trace));
    const response = await chain.compose(terminal)(new ApiRequest('GET', 'websites'));

    expect(trace).toEqual(['A:before', 'B:before', 'terminal', 'B:after', 'A:after']);
    expect(response.body).toBe('AB');
    expect(terminal).toHaveBeenCalledTimes(1);
  });

  it('lets a link answer without calling next', async () => {
    const terminal = vi.fn<Handler>();
    const cached = new ApiResponse({ status: 204 });
    const chain = new MiddlewareChain([{ handle: async () => cached }]);

    expect(await chain.compose(terminal)(new ApiRequest('GET', 'websites'))).toBe(cached);
    expect(terminal).not.toHaveBeenCalled();
  });

  it('composes to the terminal itself when empty', () => {
    const terminal: Handler = async () => new ApiResponse();
    expect(new MiddlewareChain().compose(terminal)).toBe(terminal);
  });

  it('can be nested as a link', async () => {
    const trace: string[] = [];
    const inner = new MiddlewareChain([tracing('B', trace), tracing('C', trace)]);
    const outer = new MiddlewareChain([tracing('A', trace), inner]);

    const response = await outer.compose(async (request) => new ApiResponse({ body: request.header('X-Trace') }))(
      new ApiRequest('GET', 'websites'),
    );

    expect(response.body).toBe('ABC');
    expect(outer.size).toBe(2);
    expect(inner.size).toBe(2);
  });

  it('propagates rejections from the terminal', async () => {
    const failure = new Error('boom');
    const chain = new MiddlewareChain([tracing('A', [])]);

    await expect(chain.handle(new ApiRequest('GET', 'websites'), () => Promise.reject(failure))).rejects.toBe(failure);
  });

  it('composes once per next when nested, and again after attach', async () => {
    const trace: string[] = [];
    const chain = new MiddlewareChain([tracing('A', trace)]);
    const compose = vi.spyOn(chain, 'compose');
    const next: Handler = async (request) => new ApiResponse({ body: request.header('X-Trace') });

    await chain.handle(new ApiRequest('GET', 'websites'), next);
    await chain.handle(new ApiRequest('GET', 'websites'), next);
    expect(compose).toHaveBeenCalledTimes(1);

    chain.attach(tracing('B', trace));
    const response = await chain.handle(new ApiRequest('GET', 'websites'), next);

    expect(compose).toHaveBeenCalledTimes(2);
    expect(response.body).toBe('AB');
  });
});
