/**
 * Unit Tests: Organization Membership Reconciliation
 *
 * Focus on role slug survival: the API does not reliably echo role_slug, so
 * state keeps the local value unless the server sends a non-empty one.
 *
 * @see src/reconcilers/memberships/resource.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Organization, User } from '../../src/api/types.js';
import {
  createMembershipResource,
  stateFromMembership,
  type MembershipState,
} from '../../src/reconcilers/memberships/index.js';
import { createFakeApi, CREATED_AT, type FakeWorkOS } from '../helpers/fake-api.js';
import { createTestClient, ctx } from '../helpers/client.js';

function membershipState(overrides: Partial<MembershipState> = {}): MembershipState {
  return {
    id: 'om_1',
    userId: 'user_1',
    organizationId: 'org_1',
    roleSlug: 'admin',
    status: 'active',
    createdAt: CREATED_AT,
    updatedAt: CREATED_AT,
    ...overrides,
  };
}

describe('stateFromMembership', () => {
  const membership = {
    id: 'om_1',
    object: 'organization_membership',
    user_id: 'user_1',
    organization_id: 'org_1',
    status: 'active',
    created_at: CREATED_AT,
    updated_at: CREATED_AT,
  };

  it('should keep the local role slug when the response has none', () => {
    expect(stateFromMembership({ ...membership, role_slug: null }, 'admin').roleSlug).toBe('admin');
    expect(stateFromMembership({ ...membership, role_slug: '' }, 'admin').roleSlug).toBe('admin');
  });

  it('should take a non-empty role slug from the response', () => {
    expect(stateFromMembership({ ...membership, role_slug: 'member' }, 'admin').roleSlug).toBe('member');
  });

  it('should be null when neither side has a role slug', () => {
    expect(stateFromMembership({ ...membership, role_slug: null }, null).roleSlug).toBeNull();
  });
});

describe('membership resource', () => {
  let api: FakeWorkOS;
  let user: User;
  let organization: Organization;
  const handler = createMembershipResource();

  beforeEach(() => {
    api = createFakeApi();
    handler.configure(createTestClient(api));
    user = api.seedUser('ada@example.test');
    organization = api.seedOrganization('Acme');
  });

  it('should declare user and organization as replace-only', () => {
    expect(handler.requiresReplace).toEqual(['userId', 'organizationId']);
  });

  it('should keep the planned role slug after create', async () => {
    const result = await handler.create(ctx, { userId: user.id, organizationId: organization.id, roleSlug: 'admin' });

    expect(api.lastRequest()?.body).toEqual({
      user_id: user.id,
      organization_id: organization.id,
      role_slug: 'admin',
    });
    expect(result.diagnostics).toEqual([]);
    expect(result.state).toMatchObject({
      userId: user.id,
      organizationId: organization.id,
      roleSlug: 'admin',
      status: 'active',
    });
  });

  it('should report a failed create without state', async () => {
    const result = await handler.create(ctx, { userId: 'user_missing', organizationId: organization.id });

    expect(result.state).toBeNull();
    expect(result.diagnostics).toEqual([
      {
        severity: 'error',
        summary: 'Error Creating Organization Membership',
        detail:
          'Could not create organization membership, unexpected error: ' +
          'WorkOS API error (HTTP 400) [invalid_request]: User or organization does not exist',
        kind: 'bad_request',
      },
    ]);
  });

  describe('read', () => {
    it('should keep the role slug across reads that omit it', async () => {
      const created = await handler.create(ctx, {
        userId: user.id,
        organizationId: organization.id,
        roleSlug: 'admin',
      });
      if (!created.state) throw new Error('create returned no state');

      const first = await handler.read(ctx, created.state);
      if (!first.state) throw new Error('read returned no state');
      const second = await handler.read(ctx, first.state);

      expect(first.state.roleSlug).toBe('admin');
      expect(second.state?.roleSlug).toBe('admin');
    });

    it('should keep the role slug when the server echoes an empty one', async () => {
      const created = await handler.create(ctx, {
        userId: user.id,
        organizationId: organization.id,
        roleSlug: 'admin',
      });
      if (!created.state) throw new Error('create returned no state');
      const stored = api.memberships.get(created.state.id);
      if (stored) stored.role_slug = '';
      api.echoMembershipRoleSlug = true;

      const result = await handler.read(ctx, created.state);

      expect(result.state?.roleSlug).toBe('admin');
    });

    it('should let a role slug sent by the server override state', async () => {
      const created = await handler.create(ctx, {
        userId: user.id,
        organizationId: organization.id,
        roleSlug: 'admin',
      });
      if (!created.state) throw new Error('create returned no state');
      const stored = api.memberships.get(created.state.id);
      if (stored) stored.role_slug = 'member';
      api.echoMembershipRoleSlug = true;

      const result = await handler.read(ctx, created.state);

      expect(result.state?.roleSlug).toBe('member');
    });

    it('should drop a membership that no longer exists', async () => {
      const result = await handler.read(ctx, membershipState({ id: 'om_gone' }));
      expect(result).toEqual({ state: null, diagnostics: [] });
    });
  });

  describe('update', () => {
    it('should refuse to move a membership to another user', async () => {
      const state = membershipState({ userId: user.id, organizationId: organization.id });

      const result = await handler.update(
        ctx,
        { userId: 'user_other', organizationId: organization.id, roleSlug: 'admin' },
        state
      );

      expect(result.state).toBe(state);
      expect(result.diagnostics).toEqual([
        {
          severity: 'error',
          summary: 'Immutable Attribute Changed',
          detail: 'Organization membership om_1 cannot change userId in place; the membership must be replaced.',
        },
      ]);
      expect(api.requests).toHaveLength(0);
    });

    it('should accept any user and organization for imported state', async () => {
      const created = await handler.create(ctx, { userId: user.id, organizationId: organization.id });
      if (!created.state) throw new Error('create returned no state');
      const imported = await handler.importState(ctx, created.state.id);
      if (!imported.state) throw new Error('import returned no state');

      const result = await handler.update(
        ctx,
        { userId: user.id, organizationId: organization.id, roleSlug: 'admin' },
        imported.state
      );

      expect(result.diagnostics).toEqual([]);
      expect(result.state).toMatchObject({
        id: created.state.id,
        userId: user.id,
        organizationId: organization.id,
        roleSlug: 'admin',
        createdAt: null,
      });
      expect(api.lastRequest()?.method).toBe('GET');
    });
  });

  describe('delete', () => {
    it('should treat an already deleted membership as success', async () => {
      const created = await handler.create(ctx, { userId: user.id, organizationId: organization.id });
      if (!created.state) throw new Error('create returned no state');

      const first = await handler.delete(ctx, created.state);
      const second = await handler.delete(ctx, created.state);

      expect(first).toEqual({ state: null, diagnostics: [] });
      expect(second).toEqual({ state: null, diagnostics: [] });
      expect(api.memberships.size).toBe(0);
    });
  });
});
