/**
 * Error entrypoint: typed errors raised by the request pipeline plus helpers for
 * identifying and unwrapping them through `cause` chains.
 * @module
 */

/** Error raised for other 4xx responses. */
export { ClientError, getClientError, isClientError } from './clientError.js';
/** Error raised for missing or invalid client configuration. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
/** Base class of every status-code error. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised for 404 responses. */
export { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';
/** Error raised when a success body is not JSON. */
export { isResponseDecodeError, ResponseDecodeError } from './responseDecodeError.js';
/** Error raised for 5xx responses. */
export { getServerError, isServerError, ServerError } from './serverError.js';
/** Error raised when the network call itself fails. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error raised when a service resolves a resource of the wrong type. */
export { isUnexpectedResourceError, UnexpectedResourceError } from './unexpectedResourceError.js';
/** Error raised for 422 responses, with field-level details. */
export type { FieldError } from './unprocessableEntityError.js';
export {
  getUnprocessableEntityError,
  isUnprocessableEntityError,
  UnprocessableEntityError,
} from './unprocessableEntityError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export type { ErrorClass } from './unwrapErrorType.js';
export { unwrapErrorType } from './unwrapErrorType.js';
/** Error raised when schema validation fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
