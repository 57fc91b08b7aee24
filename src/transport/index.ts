/**
 * Transport entrypoint: request/response types and the shipped transports.
 * @module
 */
export { FetchTransport, type FetchTransportOptions } from './fetchTransport.js';
export { type MockReply, MockTransport } from './mockTransport.js';
export { ApiRequest } from './request.js';
export { ApiResponse, type ApiResponseInit } from './response.js';
export type { HttpMethod, Transport } from './types.js';
export { type HeaderOptions, headersToRecord, mergeHeaderOptions } from './utils.js';
