import pino, { type Logger } from 'pino';
import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { FetchTransport } from '../transport/fetchTransport.js';
import type { Transport } from '../transport/types.js';
import { validateSync } from '../utils/validator.js';
import { BASE_HOST, DEFAULT_API_KEY_HEADER, SANDBOX_HOST, SDK_NAME } from './constants.js';

const MISSING_API_KEY = 'missing API key';

function isTransport(value: unknown): value is Transport {
  return typeof value === 'object' && value !== null && 'send' in value && typeof value.send === 'function';
}

function isLogger(value: unknown): value is Logger {
  return (
    typeof value === 'object' &&
    value !== null &&
    'info' in value &&
    typeof value.info === 'function' &&
    'error' in value &&
    typeof value.error === 'function'
  );
}

/** Client options as accepted from callers, before defaults are applied. */
export const ConfigurationSchema = z.object({
  apiKey: z
    .string({ required_error: MISSING_API_KEY, invalid_type_error: MISSING_API_KEY })
    .min(1, MISSING_API_KEY),
  baseUrl: z.string().url().nullish(),
  transport: z.custom<Transport>(isTransport, 'transport must implement send(request)').nullish(),
  apiKeyHeader: z.string().min(1).default(DEFAULT_API_KEY_HEADER),
  logger: z.custom<Logger>(isLogger, 'logger must be a pino logger').nullish(),
});

/** Options for constructing a client. Only `apiKey` is required. */
export interface ClientOptions {
  apiKey?: string | null;
  /**
   * API host, without the version segment.
   * @default 'https://api.payrest.dev'
   */
  baseUrl?: string | null;
  /** Defaults to a {@link FetchTransport}. */
  transport?: Transport | null;
  /** @default 'X-API-KEY' */
  apiKeyHeader?: string;
  /** When set, every request is logged through it. */
  logger?: Logger | null;
}

/** Validated configuration with defaults applied. Frozen. */
export interface Configuration {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly transport: Transport;
  readonly apiKeyHeader: string;
  readonly logger: Logger | null;
}

/**
 * Validates client options and applies defaults.
 * @throws {ConfigurationError} with the {@link ValidationError} as `cause`.
 */
export function resolveConfiguration(options: ClientOptions): Configuration {
  const [err, parsed] = validateSync(options, ConfigurationSchema, 'error invalid configuration');
  if (err) {
    throw new ConfigurationError(err.message, { cause: err });
  }

  return Object.freeze({
    apiKey: parsed.apiKey,
    baseUrl: (parsed.baseUrl ?? BASE_HOST).replace(/\/+$/, ''),
    transport: parsed.transport ?? new FetchTransport(),
    apiKeyHeader: parsed.apiKeyHeader,
    logger: parsed.logger ?? null,
  });
}

const EnvironmentSchema = z.object({
  PAYREST_API_KEY: z.string().optional(),
  PAYREST_BASE_URL: z.string().optional(),
  PAYREST_SANDBOX: z
    .string()
    .transform((value) => value === 'true')
    .default('false'),
  PAYREST_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
});

/**
 * Reads client options from environment variables.
 *
 * - `PAYREST_API_KEY`
 * - `PAYREST_BASE_URL`, or the sandbox host when `PAYREST_SANDBOX=true`
 * - `PAYREST_LOG_LEVEL` creates a pino logger at that level
 *
 * @example
 * const client = new Client(loadConfiguration());
 */
export function loadConfiguration(env: Record<string, string | undefined> = process.env): ClientOptions {
  const [err, parsed] = validateSync(env, EnvironmentSchema, 'error invalid environment');
  if (err) {
    throw new ConfigurationError(err.message, { cause: err });
  }

  const sandboxHost = parsed.PAYREST_SANDBOX ? SANDBOX_HOST : null;

  return {
    apiKey: parsed.PAYREST_API_KEY ?? null,
    baseUrl: parsed.PAYREST_BASE_URL || sandboxHost,
    logger: parsed.PAYREST_LOG_LEVEL ? pino({ name: SDK_NAME, level: parsed.PAYREST_LOG_LEVEL }) : null,
  };
}
