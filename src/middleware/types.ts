import type { ApiRequest } from '../transport/request.js';
import type { ApiResponse } from '../transport/response.js';

/** Next step of the pipeline: the remaining links plus the transport. */
export type Handler = (request: ApiRequest) => Promise<ApiResponse>;

/**
 * One link of the request pipeline. A link may rewrite the request before
 * calling `next`, rewrite the response after it resolves, or answer without
 * calling `next` at all.
 */
export interface Middleware {
  handle(request: ApiRequest, next: Handler): Promise<ApiResponse>;
}
