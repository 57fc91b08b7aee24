import { ConfigurationError } from '../error/configurationError.js';
import type { Client } from './client.js';

let defaultClient: Client | null = null;

/** Registers the client services fall back to when built without one. */
export function initDefaultClient(client: Client): Client {
  defaultClient = client;
  return client;
}

/** @throws {ConfigurationError} when no default client was registered. */
export function getDefaultClient(): Client {
  if (!defaultClient) {
    throw new ConfigurationError('error no default client; call initDefaultClient first');
  }

  return defaultClient;
}

export function resetDefaultClient() {
  defaultClient = null;
}
