import { createApiSchema } from '../api/schema.js';
import { type ClientOptions, type Configuration, resolveConfiguration } from '../config/configuration.js';
import { CURRENT_VERSION } from '../config/constants.js';
import { ApiKeyAuthentication } from '../middleware/apiKeyAuthentication.js';
import { BaseUriMiddleware } from '../middleware/baseUri.js';
import { MiddlewareChain } from '../middleware/chain.js';
import { LoggerMiddleware } from '../middleware/logger.js';
import type { Handler, Middleware } from '../middleware/types.js';
import { type Resource, ResourceFactory } from '../rest/factory.js';
import type { RestClient } from '../rest/types.js';
import { ApiRequest } from '../transport/request.js';
import type { ApiResponse } from '../transport/response.js';
import type { HttpMethod } from '../transport/types.js';
import { type HeaderOptions, mergeHeaderOptions } from '../transport/utils.js';
import { type Params, createUri } from '../utils/createUri.js';
import { decodeBody } from '../utils/decodeBody.js';
import { mapStatusError } from '../utils/mapStatusError.js';
import { type Payload, serializePayload } from '../utils/serializePayload.js';
import { Uri } from '../utils/uri.js';

/**
 * API client. Owns the request pipeline:
 * - builds the request URI from a path template and params,
 * - serializes the payload as a JSON object,
 * - runs the request through the middleware chain and the transport,
 * - raises the typed error for 4xx/5xx responses,
 * - resolves the body into a typed resource by the path it came from.
 *
 * Requests are independent; one client may serve concurrent calls.
 *
 * @example
 * const client = new Client({ apiKey: process.env.PAYREST_API_KEY });
 * const website = await client.get('websites/{websiteId}', { websiteId: 'w1' });
 */
export class Client implements RestClient {
  /** Validated configuration, frozen. */
  #config: Configuration;
  /** Builds typed resources from response bodies. */
  #factory: ResourceFactory;
  /** Built-in links followed by those added through {@link Client.use}. */
  #middleware: MiddlewareChain;
  /** Resolves request and `Location` paths against the base URL. */
  #baseUri: BaseUriMiddleware;
  /** Composed middleware around the transport. */
  #handler: Handler;

  /**
   * @throws {ConfigurationError} when `apiKey` is missing or an option is invalid.
   */
  constructor(options: ClientOptions) {
    this.#config = resolveConfiguration(options);
    this.#factory = new ResourceFactory(createApiSchema());

    const { apiKey, apiKeyHeader, baseUrl, logger } = this.#config;
    this.#baseUri = new BaseUriMiddleware(baseUrl, CURRENT_VERSION);
    this.#middleware = new MiddlewareChain()
      .attach(this.#baseUri)
      .attach(new ApiKeyAuthentication(apiKey, apiKeyHeader));

    if (logger) {
      this.#middleware.attach(new LoggerMiddleware(logger));
    }

    this.#handler = this.#compose();
  }

  get configuration(): Configuration {
    return this.#config;
  }

  /**
   * Attaches an extra link after the built-in ones.
   * Meant for set-up; calls already in flight keep the previous pipeline.
   */
  use(link: Middleware): this {
    this.#middleware.attach(link);
    this.#handler = this.#compose();
    return this;
  }

  get(path: string, params: Params = {}, headers: HeaderOptions = {}): Promise<Resource> {
    return this.#resource('GET', null, path, params, headers);
  }

  async head(path: string, params: Params = {}, headers: HeaderOptions = {}): Promise<null> {
    await this.#exchange('HEAD', null, path, params, headers);
    return null;
  }

  async delete(path: string, params: Params = {}, headers: HeaderOptions = {}): Promise<null> {
    await this.#exchange('DELETE', null, path, params, headers);
    return null;
  }

  post(payload: Payload, path: string, params: Params = {}, headers: HeaderOptions = {}): Promise<Resource> {
    return this.#resource('POST', payload, path, params, headers);
  }

  put(payload: Payload, path: string, params: Params = {}, headers: HeaderOptions = {}): Promise<Resource> {
    return this.#resource('PUT', payload, path, params, headers);
  }

  patch(payload: Payload, path: string, params: Params = {}, headers: HeaderOptions = {}): Promise<Resource> {
    return this.#resource('PATCH', payload, path, params, headers);
  }

  /**
   * Sends one request through the pipeline.
   *
   * Resolves to `null` for `HEAD` and `DELETE`, otherwise to the resource
   * built from the body, typed by the `Location` header path when present
   * and by the request path otherwise.
   *
   * @throws {NotFoundError | UnprocessableEntityError | ClientError | ServerError} for error statuses.
   * @throws {ResponseDecodeError} when a success body is not JSON.
   * @throws {TransportError} when the request could not be sent.
   */
  async send(
    method: HttpMethod,
    payload: Payload,
    path: string,
    params: Params = {},
    headers: HeaderOptions = {},
  ): Promise<Resource | null> {
    const { request, response } = await this.#exchange(method, payload, path, params, headers);
    if (method === 'HEAD' || method === 'DELETE') {
      return null;
    }

    return this.#toResource(request, response);
  }

  /** Request with a JSON body; `Content-Type` is always `application/json`. */
  createRequest(method: HttpMethod, uri: Uri | string, payload: Payload, headers: HeaderOptions = {}): ApiRequest {
    return new ApiRequest(
      method,
      uri,
      mergeHeaderOptions(headers, { 'Content-Type': 'application/json' }),
      serializePayload(payload),
    );
  }

  /** Expands a path template; see {@link createUri}. */
  createUri(template: string | Uri, params: Params = {}): Uri {
    return createUri(template, params);
  }

  async #resource(
    method: HttpMethod,
    payload: Payload,
    path: string,
    params: Params,
    headers: HeaderOptions,
  ): Promise<Resource> {
    const { request, response } = await this.#exchange(method, payload, path, params, headers);
    return this.#toResource(request, response);
  }

  /** Runs the request and raises the status error, if any. */
  async #exchange(
    method: HttpMethod,
    payload: Payload,
    path: string,
    params: Params,
    headers: HeaderOptions,
  ): Promise<{ request: ApiRequest; response: ApiResponse }> {
    const request = this.createRequest(method, this.createUri(path, params), payload, headers);
    const response = await this.#handler(request);

    const error = await mapStatusError(response);
    if (error) {
      throw error;
    }

    return { request, response };
  }

  #toResource(request: ApiRequest, response: ApiResponse): Resource {
    const location = response.headers.get('Location');
    const resourcePath = this.#baseUri.relativePath(location ? Uri.parse(location) : request.uri);

    const [errDecode, body] = decodeBody(response);
    if (errDecode) {
      throw errDecode;
    }

    return this.#factory.create(resourcePath, body);
  }

  #compose(): Handler {
    const transport = this.#config.transport;
    return this.#middleware.compose((request) => transport.send(request));
  }
}
