import { afterEach, describe, expect, it } from 'vitest';
import { ConfigurationError } from '../error/configurationError.js';
import { MockTransport } from '../transport/mockTransport.js';
import { Client } from './client.js';
import { getDefaultClient, initDefaultClient, resetDefaultClient } from './registry.js';

describe('default client registry', () => {
  afterEach(() => {
    resetDefaultClient();
  });

  it('throws before initialization', () => {
    expect(() => getDefaultClient()).toThrow(ConfigurationError);
    expect(() => getDefaultClient()).toThrow('error no default client; call initDefaultClient first');
  });

  it('returns the registered client until reset', () => {
    const client = new Client({ apiKey: 'test-secret', transport: new MockTransport() });

    expect(initDefaultClient(client)).toBe(client);
    expect(getDefaultClient()).toBe(client);

    resetDefaultClient();
    expect(() => getDefaultClient()).toThrow(ConfigurationError);
  });

  it('is not populated by constructing a client', () => {
    new Client({ apiKey: 'test-secret', transport: new MockTransport() });

    expect(() => getDefaultClient()).toThrow(ConfigurationError);
  });
});
