/**
 * Organization membership resource handler
 *
 * The API accepts role_slug on create but does not reliably echo it back, so
 * every response goes through the three-state merge against the local value.
 * There is no write endpoint for an existing membership: Update re-fetches and
 * re-applies the merge.
 */

import type { OrganizationMembership } from '../../api/types.js';
import { isNotFound } from '../../api/errors.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import { mergeServerValue } from '../merge.js';
import type { ResourceHandler } from '../types.js';
import type { MembershipConfig, MembershipState } from './types.js';

const SUFFIX = 'organization_membership';

/**
 * Map a membership onto state, keeping the local role slug when the
 * response omits it
 */
export function stateFromMembership(
  membership: OrganizationMembership,
  localRoleSlug: string | null | undefined
): MembershipState {
  return {
    id: membership.id,
    userId: membership.user_id,
    organizationId: membership.organization_id,
    roleSlug: mergeServerValue(membership.role_slug, localRoleSlug),
    status: membership.status,
    createdAt: membership.created_at,
    updatedAt: membership.updated_at,
  };
}

export function createMembershipResource(): ResourceHandler<MembershipConfig, MembershipState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    requiresReplace: ['userId', 'organizationId'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async create(ctx, plan) {
      const client = slot.get();
      if (!client) return slot.unconfigured<MembershipState>(null);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Creating organization membership', {
        userId: plan.userId,
        organizationId: plan.organizationId,
      });
      try {
        const membership = await client.memberships.create(
          {
            userId: plan.userId,
            organizationId: plan.organizationId,
            roleSlug: plan.roleSlug ?? undefined,
          },
          { signal: ctx.signal }
        );
        log.info('Created organization membership', { id: membership.id });
        return succeeded(stateFromMembership(membership, plan.roleSlug));
      } catch (error) {
        return failed<MembershipState>(
          null,
          diagnosticFromError(
            'Error Creating Organization Membership',
            'Could not create organization membership, unexpected error',
            error
          )
        );
      }
    },

    async read(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Reading organization membership', { id: state.id });
      try {
        const membership = await client.memberships.retrieve(state.id, { signal: ctx.signal });
        return succeeded(stateFromMembership(membership, state.roleSlug));
      } catch (error) {
        if (isNotFound(error)) {
          log.info('Organization membership not found, removing from state', { id: state.id });
          return succeeded<MembershipState>(null);
        }
        return failed(
          state,
          diagnosticFromError('Error Reading Organization Membership', `Could not read organization membership ID ${state.id}`, error)
        );
      }
    },

    async update(ctx, plan, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      const changed = [
        state.userId !== null && plan.userId !== state.userId ? 'userId' : undefined,
        state.organizationId !== null && plan.organizationId !== state.organizationId
          ? 'organizationId'
          : undefined,
      ].filter((field): field is string => field !== undefined);
      if (changed.length > 0) {
        return failed(
          state,
          errorDiagnostic(
            'Immutable Attribute Changed',
            `Organization membership ${state.id} cannot change ${changed.join(', ')} in place; the membership must be replaced.`
          )
        );
      }

      log.debug('Updating organization membership', { id: state.id });
      try {
        const membership = await client.memberships.retrieve(state.id, { signal: ctx.signal });
        return succeeded<MembershipState>({
          ...stateFromMembership(membership, plan.roleSlug),
          id: state.id,
          createdAt: state.createdAt,
        });
      } catch (error) {
        return failed(
          state,
          diagnosticFromError('Error Updating Organization Membership', 'Could not read organization membership', error)
        );
      }
    },

    async delete(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Deleting organization membership', { id: state.id });
      try {
        await client.memberships.delete(state.id, { signal: ctx.signal });
        log.info('Deleted organization membership', { id: state.id });
      } catch (error) {
        if (!isNotFound(error)) {
          return failed(
            state,
            diagnosticFromError(
              'Error Deleting Organization Membership',
              'Could not delete organization membership, unexpected error',
              error
            )
          );
        }
      }
      return succeeded<MembershipState>(null);
    },

    async importState(ctx, id) {
      contextLogger(ctx, SUFFIX).debug('Importing organization membership', { id });
      return succeeded<MembershipState>({
        id,
        userId: null,
        organizationId: null,
        roleSlug: null,
        status: null,
        createdAt: null,
        updatedAt: null,
      });
    },
  };
}
