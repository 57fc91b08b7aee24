import type { ApiRequest } from './request.js';
import type { ApiResponse } from './response.js';

/** HTTP methods the client sends. */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Sends one fully-formed request and returns the raw response.
 *
 * Implementations must not throw for 4xx/5xx statuses; those are mapped by
 * the client. A failure to obtain any response rejects. A transport shared by
 * a client must tolerate concurrent `send` calls.
 */
export interface Transport {
  send(request: ApiRequest): Promise<ApiResponse>;
}
