/**
 * Unit Tests: Provider Configuration Resolution
 *
 * Tests the explicit-then-environment resolution chain:
 * 1. explicit configuration
 * 2. WORKOS_API_KEY / WORKOS_CLIENT_ID / WORKOS_BASE_URL
 * 3. default base URL
 *
 * @see src/config/provider.ts
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/api/errors.js';
import { resolveProviderConfig } from '../../src/config/index.js';

describe('resolveProviderConfig', () => {
  it('should read every value from the environment', () => {
    const config = resolveProviderConfig(
      {},
      {
        WORKOS_API_KEY: 'test-secret',
        WORKOS_CLIENT_ID: 'client_test',
        WORKOS_BASE_URL: 'https://api.workos.test',
      }
    );

    expect(config).toEqual({
      apiKey: 'test-secret',
      clientId: 'client_test',
      baseUrl: 'https://api.workos.test',
      sources: { apiKey: 'env', clientId: 'env', baseUrl: 'env' },
    });
  });

  it('should prefer explicit configuration over the environment', () => {
    const config = resolveProviderConfig(
      { apiKey: 'explicit-secret', baseUrl: 'https://explicit.workos.test' },
      { WORKOS_API_KEY: 'env-secret', WORKOS_BASE_URL: 'https://env.workos.test' }
    );

    expect(config.apiKey).toBe('explicit-secret');
    expect(config.baseUrl).toBe('https://explicit.workos.test');
    expect(config.sources.apiKey).toBe('explicit');
  });

  it('should default the base URL', () => {
    const config = resolveProviderConfig({ apiKey: 'test-secret' }, {});
    expect(config.baseUrl).toBe('https://api.workos.com');
    expect(config.sources.baseUrl).toBe('default');
    expect(config.clientId).toBeUndefined();
  });

  it('should fail without an API key', () => {
    expect(() => resolveProviderConfig({}, {})).toThrow(ConfigurationError);
    expect(() => resolveProviderConfig({}, {})).toThrow('Missing WorkOS API Key');
  });

  it('should treat an explicit empty API key as missing, without falling back', () => {
    expect(() => resolveProviderConfig({ apiKey: '' }, { WORKOS_API_KEY: 'test-secret' })).toThrow(
      'Missing WorkOS API Key'
    );
  });

  it('should explain how to supply the key', () => {
    let caught: unknown;
    try {
      resolveProviderConfig({}, { WORKOS_API_KEY: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      detail: expect.stringContaining('WORKOS_API_KEY environment variable'),
    });
  });

  it('should reject a base URL that does not parse', () => {
    expect(() => resolveProviderConfig({ apiKey: 'test-secret', baseUrl: 'not a url' }, {})).toThrow(
      'Invalid WorkOS Base URL'
    );
  });
});
