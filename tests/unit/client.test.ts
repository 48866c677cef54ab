/**
 * Unit Tests: Entity Clients
 *
 * Tests the wire mapping of each entity family, cursor pagination and the
 * find* helpers against the in-process fake API.
 *
 * @see src/api/client.ts
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { WorkOSClient } from '../../src/api/client.js';
import { isNotFound } from '../../src/api/errors.js';
import { createFakeApi, CREATED_AT, type FakeWorkOS } from '../helpers/fake-api.js';
import { createTestClient, TEST_BASE_URL } from '../helpers/client.js';

describe('createClient', () => {
  let api: FakeWorkOS;
  let client: WorkOSClient;

  beforeEach(() => {
    api = createFakeApi();
    client = createTestClient(api);
  });

  it('should tag each entity family with its capability', () => {
    expect(client.organizations.capability).toBe('crud');
    expect(client.users.capability).toBe('crud');
    expect(client.webhooks.capability).toBe('crud');
    expect(client.roles.capability).toBe('crud');
    expect(client.memberships.capability).toBe('create-delete');
    expect(client.connections.capability).toBe('read-only');
    expect(client.directories.capability).toBe('read-only');
    expect(client.directoryUsers.capability).toBe('read-only');
    expect(client.directoryGroups.capability).toBe('read-only');
  });

  it('should report configuration without the API key', () => {
    expect(client.getConfig()).toEqual({ baseUrl: TEST_BASE_URL, clientId: undefined, hasApiKey: true });
  });

  // ===========================================================================
  // Organizations
  // ===========================================================================

  describe('organizations', () => {
    it('should send snake_case fields on create', async () => {
      await client.organizations.create({
        name: 'Acme',
        domainData: [{ domain: 'acme.test', state: 'verified' }],
        allowProfilesOutsideOrganization: true,
      });

      const request = api.lastRequest();
      expect(request?.method).toBe('POST');
      expect(request?.path).toBe('/organizations');
      expect(request?.body).toEqual({
        name: 'Acme',
        domain_data: [{ domain: 'acme.test', state: 'verified' }],
        allow_profiles_outside_organization: true,
      });
    });

    it('should update with PUT', async () => {
      const org = api.seedOrganization('Acme');
      await client.organizations.update(org.id, { name: 'Acme Corp' });

      expect(api.lastRequest()?.method).toBe('PUT');
      expect(api.lastRequest()?.body).toEqual({ name: 'Acme Corp' });
      expect(api.organizations.get(org.id)?.name).toBe('Acme Corp');
    });

    it('should find an organization by domain', async () => {
      api.seedOrganization('Other', ['other.test']);
      const acme = api.seedOrganization('Acme', ['acme.test']);

      const found = await client.organizations.findByDomain('acme.test');

      expect(found.id).toBe(acme.id);
      expect(api.lastRequest()?.query).toEqual({ domains: 'acme.test' });
    });

    it('should raise not-found when no organization owns the domain', async () => {
      const error = await client.organizations.findByDomain('nobody.test').catch((e: unknown) => e);
      expect(isNotFound(error)).toBe(true);
    });

    it('should follow after cursors in listAll', async () => {
      for (let i = 0; i < 205; i++) {
        api.seedOrganization(`Org ${i}`);
      }

      const all = await client.organizations.listAll();

      expect(all).toHaveLength(205);
      const pages = api.requestsTo('GET', '/organizations');
      expect(pages).toHaveLength(3);
      expect(pages[0]?.query).toEqual({ limit: '100' });
      expect(pages[1]?.query.after).toBe(all[99]?.id);
      expect(pages[2]?.query.after).toBe(all[199]?.id);
    });
  });

  // ===========================================================================
  // Users and memberships
  // ===========================================================================

  describe('users', () => {
    it('should map write-only password fields onto the wire', async () => {
      await client.users.create({
        email: 'ada@example.test',
        emailVerified: true,
        passwordHash: 'hash-placeholder',
        passwordHashType: 'bcrypt',
      });

      expect(api.lastRequest()?.path).toBe('/user_management/users');
      expect(api.lastRequest()?.body).toEqual({
        email: 'ada@example.test',
        email_verified: true,
        password_hash: 'hash-placeholder',
        password_hash_type: 'bcrypt',
      });
    });

    it('should find a user by email', async () => {
      const user = api.seedUser('ada@example.test');
      await expect(client.users.findByEmail('ada@example.test')).resolves.toMatchObject({ id: user.id });
      expect(api.lastRequest()?.query).toEqual({ email: 'ada@example.test' });
    });
  });

  describe('memberships', () => {
    it('should transition status with bodyless PUT calls', async () => {
      const org = api.seedOrganization('Acme');
      const user = api.seedUser('ada@example.test');
      const membership = await client.memberships.create({ userId: user.id, organizationId: org.id });

      const inactive = await client.memberships.deactivate(membership.id);
      expect(inactive.status).toBe('inactive');
      expect(api.lastRequest()?.method).toBe('PUT');
      expect(api.lastRequest()?.path).toBe(`/user_management/organization_memberships/${membership.id}/deactivate`);
      expect(api.lastRequest()?.rawBody).toBeUndefined();

      const active = await client.memberships.reactivate(membership.id);
      expect(active.status).toBe('active');
    });
  });

  // ===========================================================================
  // Roles
  // ===========================================================================

  describe('roles', () => {
    it('should address roles by organization and slug and update with PATCH', async () => {
      const org = api.seedOrganization('Acme');
      api.seedRole(org.id, 'org-admin', 'Admin');

      const updated = await client.roles.update(org.id, 'org-admin', { name: 'Administrator', description: 'All access' });

      expect(updated.name).toBe('Administrator');
      expect(api.lastRequest()?.method).toBe('PATCH');
      expect(api.lastRequest()?.path).toBe(`/authorization/organizations/${org.id}/roles/org-admin`);
      expect(api.lastRequest()?.body).toEqual({ name: 'Administrator', description: 'All access' });
    });

    it('should find a role by id through the list endpoint', async () => {
      const org = api.seedOrganization('Acme');
      api.seedRole(org.id, 'org-viewer', 'Viewer');
      const admin = api.seedRole(org.id, 'org-admin', 'Admin');

      await expect(client.roles.findById(org.id, admin.id)).resolves.toMatchObject({ slug: 'org-admin' });
    });

    it('should raise not-found for an unknown role id', async () => {
      const org = api.seedOrganization('Acme');
      const error = await client.roles.findById(org.id, 'role_missing').catch((e: unknown) => e);
      expect(isNotFound(error)).toBe(true);
    });
  });

  // ===========================================================================
  // Read-only families
  // ===========================================================================

  describe('directory groups', () => {
    it('should match a group by name across pages', async () => {
      for (let i = 0; i < 120; i++) {
        api.directoryGroups.push({
          id: `directory_group_${String(i).padStart(3, '0')}`,
          directory_id: 'directory_1',
          organization_id: 'org_1',
          idp_id: `idp_${i}`,
          name: `Group ${i}`,
          created_at: CREATED_AT,
          updated_at: CREATED_AT,
        });
      }

      const group = await client.directoryGroups.findByName('directory_1', 'Group 110');

      expect(group.id).toBe('directory_group_110');
      expect(api.requestsTo('GET', '/directory_groups')).toHaveLength(2);
    });
  });

  describe('connections', () => {
    it('should filter by organization and connection type', async () => {
      api.connections.push({
        id: 'conn_1',
        organization_id: 'org_1',
        connection_type: 'OktaSAML',
        name: 'Okta',
        state: 'active',
        created_at: CREATED_AT,
        updated_at: CREATED_AT,
      });

      const connection = await client.connections.findByOrganizationAndType('org_1', 'OktaSAML');

      expect(connection.id).toBe('conn_1');
      expect(api.lastRequest()?.query).toEqual({ organization_id: 'org_1', connection_type: 'OktaSAML' });
    });
  });
});
