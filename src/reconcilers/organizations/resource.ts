/**
 * Organization resource handler
 *
 * Domains are sent as `domain_data` entries marked verified and replaced in
 * full on update. Reads map the domain detail objects back to plain strings.
 */

import type { Organization, DomainData } from '../../api/types.js';
import { isNotFound } from '../../api/errors.js';
import { diagnosticFromError, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import { nullIfEmptyList } from '../merge.js';
import type { ResourceHandler } from '../types.js';
import type { OrganizationConfig, OrganizationState } from './types.js';

const SUFFIX = 'organization';

/**
 * Wrap each configured domain with the verified state marker
 */
export function toDomainData(domains: readonly string[] | null | undefined): DomainData[] {
  return (domains ?? []).map((domain): DomainData => ({ domain, state: 'verified' }));
}

/**
 * Plain domain strings of an organization; empty or absent becomes null
 */
export function domainsOf(organization: Organization): string[] | null {
  return nullIfEmptyList((organization.domains ?? []).map((d) => d.domain));
}

/**
 * State derived entirely from the API response
 */
export function stateFromOrganization(organization: Organization, prior?: OrganizationState): OrganizationState {
  return {
    id: organization.id,
    name: organization.name,
    domains: domainsOf(organization),
    allowProfilesOutsideOrganization:
      organization.allow_profiles_outside_organization ?? prior?.allowProfilesOutsideOrganization ?? null,
    createdAt: organization.created_at,
    updatedAt: organization.updated_at,
  };
}

export function createOrganizationResource(): ResourceHandler<OrganizationConfig, OrganizationState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    requiresReplace: [],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async create(ctx, plan) {
      const client = slot.get();
      if (!client) return slot.unconfigured<OrganizationState>(null);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Creating organization', { name: plan.name });
      try {
        const organization = await client.organizations.create(
          {
            name: plan.name,
            domainData: toDomainData(plan.domains),
            allowProfilesOutsideOrganization: plan.allowProfilesOutsideOrganization ?? undefined,
          },
          { signal: ctx.signal }
        );
        log.info('Created organization', { id: organization.id });

        return succeeded<OrganizationState>({
          id: organization.id,
          name: plan.name,
          domains: nullIfEmptyList(plan.domains),
          allowProfilesOutsideOrganization:
            plan.allowProfilesOutsideOrganization ?? organization.allow_profiles_outside_organization ?? null,
          createdAt: organization.created_at,
          updatedAt: organization.updated_at,
        });
      } catch (error) {
        return failed<OrganizationState>(null, diagnosticFromError('Error Creating Organization', 'Could not create organization, unexpected error', error));
      }
    },

    async read(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Reading organization', { id: state.id });
      try {
        const organization = await client.organizations.retrieve(state.id, { signal: ctx.signal });
        return succeeded(stateFromOrganization(organization, state));
      } catch (error) {
        if (isNotFound(error)) {
          log.info('Organization not found, removing from state', { id: state.id });
          return succeeded<OrganizationState>(null);
        }
        return failed(state, diagnosticFromError('Error Reading Organization', `Could not read organization ID ${state.id}`, error));
      }
    },

    async update(ctx, plan, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Updating organization', { id: state.id, name: plan.name });
      try {
        const organization = await client.organizations.update(
          state.id,
          {
            name: plan.name,
            domainData: toDomainData(plan.domains),
            allowProfilesOutsideOrganization: plan.allowProfilesOutsideOrganization ?? undefined,
          },
          { signal: ctx.signal }
        );
        log.info('Updated organization', { id: state.id });

        return succeeded<OrganizationState>({
          id: state.id,
          name: plan.name,
          domains: nullIfEmptyList(plan.domains),
          allowProfilesOutsideOrganization:
            plan.allowProfilesOutsideOrganization ??
            organization.allow_profiles_outside_organization ??
            state.allowProfilesOutsideOrganization,
          createdAt: state.createdAt,
          updatedAt: organization.updated_at,
        });
      } catch (error) {
        return failed(state, diagnosticFromError('Error Updating Organization', 'Could not update organization, unexpected error', error));
      }
    },

    async delete(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Deleting organization', { id: state.id });
      try {
        await client.organizations.delete(state.id, { signal: ctx.signal });
        log.info('Deleted organization', { id: state.id });
      } catch (error) {
        if (!isNotFound(error)) {
          return failed(state, diagnosticFromError('Error Deleting Organization', 'Could not delete organization, unexpected error', error));
        }
        log.info('Organization already deleted', { id: state.id });
      }
      return succeeded<OrganizationState>(null);
    },

    async importState(ctx, id) {
      contextLogger(ctx, SUFFIX).debug('Importing organization', { id });
      return succeeded<OrganizationState>({
        id,
        name: null,
        domains: null,
        allowProfilesOutsideOrganization: null,
        createdAt: null,
        updatedAt: null,
      });
    },
  };
}
