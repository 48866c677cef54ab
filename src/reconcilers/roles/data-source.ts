/**
 * Organization role data source: lookup by organization + slug or
 * organization + id
 */

import type { OrganizationRole } from '../../api/types.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import type { DataSourceHandler } from '../types.js';
import { stateFromRole } from './resource.js';
import type { RoleLookup, RoleState } from './types.js';

const SUFFIX = 'organization_role';

export function createRoleDataSource(): DataSourceHandler<RoleLookup, RoleState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    lookupKeys: ['organizationId', 'slug', 'id'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<RoleState>(null);
      const log = contextLogger(ctx, SUFFIX);
      const options = { signal: ctx.signal };

      const organizationId = lookup.organizationId;
      if (!organizationId) {
        return failed<RoleState>(
          null,
          errorDiagnostic('Missing Required Attribute', "'organizationId' must be specified to look up an organization role.")
        );
      }

      let role: OrganizationRole;
      if (lookup.slug) {
        log.debug('Reading organization role by slug', { organizationId, slug: lookup.slug });
        try {
          role = await client.roles.retrieve(organizationId, lookup.slug, options);
        } catch (error) {
          return failed<RoleState>(
            null,
            diagnosticFromError('Error Reading Organization Role', `Could not read organization role with slug ${lookup.slug}`, error)
          );
        }
      } else if (lookup.id) {
        log.debug('Reading organization role by ID', { organizationId, id: lookup.id });
        try {
          role = await client.roles.findById(organizationId, lookup.id, options);
        } catch (error) {
          return failed<RoleState>(
            null,
            diagnosticFromError('Error Reading Organization Role', `Could not find organization role with ID ${lookup.id}`, error)
          );
        }
      } else {
        return failed<RoleState>(
          null,
          errorDiagnostic('Missing Required Attribute', "Either 'slug' or 'id' must be specified to look up an organization role.")
        );
      }

      return succeeded(stateFromRole(role, organizationId));
    },
  };
}
