/**
 * Unit Tests: Provider Registry
 *
 * @see src/provider.ts
 */

import { describe, it, expect } from 'vitest';
import { createProvider, qualifyTypeName } from '../../src/provider.js';
import { createFakeApi } from '../helpers/fake-api.js';
import { ctx, quietLogger, TEST_BASE_URL } from '../helpers/client.js';

describe('qualifyTypeName', () => {
  it('should prefix bare names and keep qualified ones', () => {
    expect(qualifyTypeName('workos', 'organization')).toBe('workos_organization');
    expect(qualifyTypeName('workos', 'workos_organization')).toBe('workos_organization');
  });
});

describe('createProvider', () => {
  it('should register every resource and data source type', () => {
    const provider = createProvider();

    expect(provider.resourceTypeNames()).toEqual([
      'workos_organization',
      'workos_connection',
      'workos_directory',
      'workos_webhook',
      'workos_user',
      'workos_organization_membership',
      'workos_organization_role',
    ]);
    expect(provider.dataSourceTypeNames()).toEqual([
      'workos_organization',
      'workos_connection',
      'workos_directory',
      'workos_directory_user',
      'workos_directory_group',
      'workos_user',
      'workos_organization_role',
    ]);
  });

  it('should resolve handlers by bare or qualified name', () => {
    const provider = createProvider();

    expect(provider.resource('user')).toBe(provider.resource('workos_user'));
    expect(provider.dataSource('directory_group')).toBeDefined();
    expect(provider.resource('directory_user')).toBeUndefined();
  });

  it('should report a missing API key as a diagnostic and leave handlers unconfigured', async () => {
    const provider = createProvider();

    const result = provider.configure({ logger: quietLogger }, {});

    expect(result.ok).toBe(false);
    expect(result.diagnostics[0]?.summary).toBe('Missing WorkOS API Key');
    expect(provider.client()).toBeUndefined();

    const created = await provider.resource('organization')?.create(ctx, { name: 'Acme' });
    expect(created?.diagnostics[0]?.summary).toBe('Unconfigured API Client');
  });

  it('should hand one client to every handler', async () => {
    const api = createFakeApi();
    const provider = createProvider();

    const result = provider.configure({ fetch: api.fetch, logger: quietLogger }, {
      WORKOS_API_KEY: 'test-secret',
      WORKOS_BASE_URL: TEST_BASE_URL,
    });

    expect(result).toMatchObject({ ok: true, config: { baseUrl: TEST_BASE_URL, sources: { apiKey: 'env' } } });
    expect(provider.client()?.getConfig()).toEqual({ baseUrl: TEST_BASE_URL, clientId: undefined, hasApiKey: true });

    api.seedOrganization('Acme', ['acme.test']);
    const found = await provider.dataSource('organization')?.read(ctx, { domain: 'acme.test' });

    expect(found?.state).toMatchObject({ name: 'Acme' });
    expect(api.lastRequest()?.headers.authorization).toBe('Bearer test-secret');
  });
});
