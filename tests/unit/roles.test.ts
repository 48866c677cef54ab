/**
 * Unit Tests: Organization Role Reconciliation
 *
 * @see src/reconcilers/roles/resource.ts
 * @see src/reconcilers/roles/data-source.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ImportIdError } from '../../src/api/errors.js';
import type { Organization } from '../../src/api/types.js';
import {
  createRoleDataSource,
  createRoleResource,
  parseRoleImportId,
  type RoleState,
} from '../../src/reconcilers/roles/index.js';
import { createFakeApi, CREATED_AT, UPDATED_AT, type FakeWorkOS } from '../helpers/fake-api.js';
import { createTestClient, ctx } from '../helpers/client.js';

describe('parseRoleImportId', () => {
  it('should split organization and slug', () => {
    expect(parseRoleImportId('org_123/org-billing-admin')).toEqual({
      organizationId: 'org_123',
      slug: 'org-billing-admin',
    });
  });

  it('should reject a missing slug', () => {
    expect(() => parseRoleImportId('org_123')).toThrow(ImportIdError);
    expect(() => parseRoleImportId('org_123/')).toThrow(ImportIdError);
  });

  it('should reject an empty organization or extra segments', () => {
    expect(() => parseRoleImportId('/org-admin')).toThrow(ImportIdError);
    expect(() => parseRoleImportId('org_123/org-admin/extra')).toThrow(
      'Expected import identifier with format: organization_id/slug. Got: "org_123/org-admin/extra"'
    );
  });
});

describe('role resource', () => {
  let api: FakeWorkOS;
  let organization: Organization;
  const handler = createRoleResource();

  beforeEach(() => {
    api = createFakeApi();
    handler.configure(createTestClient(api));
    organization = api.seedOrganization('Acme');
  });

  function roleState(overrides: Partial<RoleState> = {}): RoleState {
    return {
      id: 'role_1',
      organizationId: organization.id,
      slug: 'org-billing',
      name: 'Billing',
      description: '',
      type: 'OrganizationRole',
      permissions: [],
      createdAt: CREATED_AT,
      updatedAt: CREATED_AT,
      ...overrides,
    };
  }

  describe('create', () => {
    it('should reject a slug without the organization prefix before calling the API', async () => {
      const result = await handler.create(ctx, { organizationId: organization.id, slug: 'billing', name: 'Billing' });

      expect(result).toEqual({
        state: null,
        diagnostics: [
          {
            severity: 'error',
            summary: 'Invalid Role Slug',
            detail: 'Organization role slugs must start with "org-", got: billing',
          },
        ],
      });
      expect(api.requests).toHaveLength(0);
    });

    it('should create the role and record server-computed fields', async () => {
      api.assignIds('role', 'role_billing');

      const result = await handler.create(ctx, {
        organizationId: organization.id,
        slug: 'org-billing',
        name: 'Billing',
        description: 'Manages invoices',
      });

      expect(api.lastRequest()?.path).toBe(`/authorization/organizations/${organization.id}/roles`);
      expect(api.lastRequest()?.body).toEqual({
        slug: 'org-billing',
        name: 'Billing',
        description: 'Manages invoices',
      });
      expect(result.state).toEqual({
        id: 'role_billing',
        organizationId: organization.id,
        slug: 'org-billing',
        name: 'Billing',
        description: 'Manages invoices',
        type: 'OrganizationRole',
        permissions: [],
        createdAt: CREATED_AT,
        updatedAt: CREATED_AT,
      });
    });

    it('should report a duplicate slug as a conflict', async () => {
      api.seedRole(organization.id, 'org-billing', 'Billing');

      const result = await handler.create(ctx, { organizationId: organization.id, slug: 'org-billing', name: 'Billing' });

      expect(result.state).toBeNull();
      expect(result.diagnostics[0]).toMatchObject({ summary: 'Error Creating Organization Role', kind: 'conflict' });
    });
  });

  describe('update', () => {
    it('should skip the request when name and description are unchanged', async () => {
      const state = roleState();

      const result = await handler.update(ctx, { organizationId: organization.id, slug: 'org-billing', name: 'Billing' }, state);

      expect(result).toEqual({ state, diagnostics: [] });
      expect(api.requests).toHaveLength(0);
    });

    it('should patch a changed name and keep the current description', async () => {
      api.seedRole(organization.id, 'org-billing', 'Billing', 'Manages invoices');
      const state = roleState({ description: 'Manages invoices' });

      const result = await handler.update(
        ctx,
        { organizationId: organization.id, slug: 'org-billing', name: 'Billing Admins' },
        state
      );

      expect(api.lastRequest()?.method).toBe('PATCH');
      expect(api.lastRequest()?.body).toEqual({ name: 'Billing Admins', description: 'Manages invoices' });
      expect(result.state).toMatchObject({
        id: 'role_1',
        name: 'Billing Admins',
        description: 'Manages invoices',
        createdAt: CREATED_AT,
        updatedAt: UPDATED_AT,
      });
    });
  });

  describe('importState', () => {
    it('should fail on a malformed identifier without calling the API', async () => {
      const result = await handler.importState(ctx, 'org_123');

      expect(result).toEqual({
        state: null,
        diagnostics: [
          {
            severity: 'error',
            summary: 'Invalid Import ID',
            detail:
              'Could not import organization role: Expected import identifier with format: organization_id/slug. Got: "org_123"',
          },
        ],
      });
      expect(api.requests).toHaveLength(0);
    });

    it('should be completed by the next read', async () => {
      const role = api.seedRole(organization.id, 'org-billing', 'Billing');

      const imported = await handler.importState(ctx, `${organization.id}/org-billing`);
      expect(imported.state).toMatchObject({ id: null, organizationId: organization.id, slug: 'org-billing' });
      if (!imported.state) throw new Error('import returned no state');

      const read = await handler.read(ctx, imported.state);

      expect(read.state).toMatchObject({ id: role.id, name: 'Billing', type: 'OrganizationRole' });
    });
  });

  it('should drop a role that no longer exists and tolerate a repeated delete', async () => {
    const state = roleState();

    expect(await handler.read(ctx, state)).toEqual({ state: null, diagnostics: [] });
    expect(await handler.delete(ctx, state)).toEqual({ state: null, diagnostics: [] });
  });
});

describe('role data source', () => {
  let api: FakeWorkOS;
  let organization: Organization;
  const dataSource = createRoleDataSource();

  beforeEach(() => {
    api = createFakeApi();
    dataSource.configure(createTestClient(api));
    organization = api.seedOrganization('Acme');
  });

  it('should find a role by slug', async () => {
    const role = api.seedRole(organization.id, 'org-billing', 'Billing');

    const result = await dataSource.read(ctx, { organizationId: organization.id, slug: 'org-billing' });

    expect(result.state?.id).toBe(role.id);
  });

  it('should find a role by id', async () => {
    api.seedRole(organization.id, 'org-billing', 'Billing');
    const support = api.seedRole(organization.id, 'org-support', 'Support');

    const result = await dataSource.read(ctx, { organizationId: organization.id, id: support.id });

    expect(result.state?.slug).toBe('org-support');
  });

  it('should require the organization', async () => {
    const result = await dataSource.read(ctx, { slug: 'org-billing' });

    expect(result.state).toBeNull();
    expect(result.diagnostics[0]?.summary).toBe('Missing Required Attribute');
  });

  it('should report an unknown role id as not found', async () => {
    const result = await dataSource.read(ctx, { organizationId: organization.id, id: 'role_missing' });

    expect(result.diagnostics).toEqual([
      {
        severity: 'error',
        summary: 'Error Reading Organization Role',
        detail:
          'Could not find organization role with ID role_missing: ' +
          'WorkOS API error (HTTP 404) [not_found]: no organization role found with ID: role_missing',
        kind: 'not_found',
      },
    ]);
  });
});
