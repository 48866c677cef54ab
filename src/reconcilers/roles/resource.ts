/**
 * Organization role resource handler
 *
 * Role endpoints are addressed by (organizationId, slug). Type and permissions
 * are computed by the server and never sent.
 */

import type { OrganizationRole } from '../../api/types.js';
import { ImportIdError, isNotFound } from '../../api/errors.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import type { ResourceHandler } from '../types.js';
import { ROLE_IMPORT_FORMAT, ROLE_SLUG_PREFIX, type RoleConfig, type RoleState } from './types.js';

const SUFFIX = 'organization_role';

/**
 * Split an "organizationId/slug" import identifier
 *
 * @throws ImportIdError on a wrong segment count or an empty segment
 */
export function parseRoleImportId(id: string): { organizationId: string; slug: string } {
  const parts = id.split('/');
  const [organizationId, slug] = parts;
  if (parts.length !== 2 || !organizationId || !slug) {
    throw new ImportIdError(id, ROLE_IMPORT_FORMAT);
  }
  return { organizationId, slug };
}

export function stateFromRole(role: OrganizationRole, organizationId: string): RoleState {
  return {
    id: role.id,
    organizationId,
    slug: role.slug,
    name: role.name,
    description: role.description ?? '',
    type: role.type ?? null,
    permissions: role.permissions ? [...role.permissions] : [],
    createdAt: role.created_at,
    updatedAt: role.updated_at,
  };
}

export function createRoleResource(): ResourceHandler<RoleConfig, RoleState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    requiresReplace: ['organizationId', 'slug'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async create(ctx, plan) {
      if (!plan.slug.startsWith(ROLE_SLUG_PREFIX)) {
        return failed<RoleState>(
          null,
          errorDiagnostic(
            'Invalid Role Slug',
            `Organization role slugs must start with "${ROLE_SLUG_PREFIX}", got: ${plan.slug}`
          )
        );
      }

      const client = slot.get();
      if (!client) return slot.unconfigured<RoleState>(null);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Creating organization role', {
        organizationId: plan.organizationId,
        slug: plan.slug,
        name: plan.name,
      });
      try {
        const role = await client.roles.create(
          plan.organizationId,
          { slug: plan.slug, name: plan.name, description: plan.description },
          { signal: ctx.signal }
        );
        log.info('Created organization role', { id: role.id, slug: role.slug });
        return succeeded<RoleState>({
          ...stateFromRole(role, plan.organizationId),
          slug: plan.slug,
          name: plan.name,
        });
      } catch (error) {
        return failed<RoleState>(
          null,
          diagnosticFromError('Error Creating Organization Role', 'Could not create organization role, unexpected error', error)
        );
      }
    },

    async read(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Reading organization role', { organizationId: state.organizationId, slug: state.slug });
      try {
        const role = await client.roles.retrieve(state.organizationId, state.slug, { signal: ctx.signal });
        return succeeded(stateFromRole(role, state.organizationId));
      } catch (error) {
        if (isNotFound(error)) {
          log.info('Organization role not found, removing from state', {
            organizationId: state.organizationId,
            slug: state.slug,
          });
          return succeeded<RoleState>(null);
        }
        return failed(
          state,
          diagnosticFromError('Error Reading Organization Role', `Could not read organization role ${state.slug}`, error)
        );
      }
    },

    async update(ctx, plan, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      const description = plan.description ?? state.description ?? '';
      if (plan.name === state.name && description === (state.description ?? '')) {
        log.debug('Organization role unchanged, skipping update', { slug: state.slug });
        return succeeded<RoleState>({ ...state, name: plan.name });
      }

      log.debug('Updating organization role', {
        organizationId: state.organizationId,
        slug: state.slug,
        name: plan.name,
      });
      try {
        const role = await client.roles.update(
          state.organizationId,
          state.slug,
          { name: plan.name, description },
          { signal: ctx.signal }
        );
        log.info('Updated organization role', { slug: state.slug });
        return succeeded<RoleState>({
          ...stateFromRole(role, state.organizationId),
          id: state.id ?? role.id,
          slug: state.slug,
          name: plan.name,
          type: state.type ?? role.type ?? null,
          createdAt: state.createdAt,
        });
      } catch (error) {
        return failed(
          state,
          diagnosticFromError('Error Updating Organization Role', 'Could not update organization role, unexpected error', error)
        );
      }
    },

    async delete(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Deleting organization role', { organizationId: state.organizationId, slug: state.slug });
      try {
        await client.roles.delete(state.organizationId, state.slug, { signal: ctx.signal });
        log.info('Deleted organization role', { organizationId: state.organizationId, slug: state.slug });
      } catch (error) {
        if (!isNotFound(error)) {
          return failed(
            state,
            diagnosticFromError('Error Deleting Organization Role', 'Could not delete organization role, unexpected error', error)
          );
        }
      }
      return succeeded<RoleState>(null);
    },

    async importState(ctx, id) {
      contextLogger(ctx, SUFFIX).debug('Importing organization role', { id });
      let key: { organizationId: string; slug: string };
      try {
        key = parseRoleImportId(id);
      } catch (error) {
        return failed<RoleState>(null, diagnosticFromError('Invalid Import ID', 'Could not import organization role', error));
      }

      return succeeded<RoleState>({
        id: null,
        organizationId: key.organizationId,
        slug: key.slug,
        name: null,
        description: null,
        type: null,
        permissions: [],
        createdAt: null,
        updatedAt: null,
      });
    },
  };
}
