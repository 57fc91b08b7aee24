import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Raised when a client is built from missing or invalid configuration,
 * e.g. without an API key. Never raised at request time.
 */
export class ConfigurationError extends Error {
  /** ConfigurationError error-name */
  static override name = 'ConfigurationError';
}

/**
 * Extracts a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): ConfigurationError | null {
  return unwrapErrorType(ConfigurationError, error);
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}
