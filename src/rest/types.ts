import type { HeaderOptions } from '../transport/utils.js';
import type { Params } from '../utils/createUri.js';
import type { Payload } from '../utils/serializePayload.js';
import type { Resource } from './factory.js';

/** Verb surface services and paginators call; implemented by `Client`. */
export interface RestClient {
  get(path: string, params?: Params, headers?: HeaderOptions): Promise<Resource>;
  post(payload: Payload, path: string, params?: Params, headers?: HeaderOptions): Promise<Resource>;
  put(payload: Payload, path: string, params?: Params, headers?: HeaderOptions): Promise<Resource>;
  patch(payload: Payload, path: string, params?: Params, headers?: HeaderOptions): Promise<Resource>;
  delete(path: string, params?: Params, headers?: HeaderOptions): Promise<null>;
}
