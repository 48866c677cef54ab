/**
 * Organization data source: lookup by id or by domain
 */

import type { Organization } from '../../api/types.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import type { DataSourceHandler } from '../types.js';
import { stateFromOrganization } from './resource.js';
import type { OrganizationLookup, OrganizationState } from './types.js';

const SUFFIX = 'organization';

export function createOrganizationDataSource(): DataSourceHandler<OrganizationLookup, OrganizationState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    lookupKeys: ['id', 'domain'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<OrganizationState>(null);
      const log = contextLogger(ctx, SUFFIX);
      const options = { signal: ctx.signal };

      let organization: Organization;
      if (lookup.id) {
        log.debug('Reading organization by ID', { id: lookup.id });
        try {
          organization = await client.organizations.retrieve(lookup.id, options);
        } catch (error) {
          return failed<OrganizationState>(
            null,
            diagnosticFromError('Error Reading Organization', `Could not read organization ID ${lookup.id}`, error)
          );
        }
      } else if (lookup.domain) {
        log.debug('Reading organization by domain', { domain: lookup.domain });
        try {
          organization = await client.organizations.findByDomain(lookup.domain, options);
        } catch (error) {
          return failed<OrganizationState>(
            null,
            diagnosticFromError('Error Reading Organization', `Could not find organization with domain ${lookup.domain}`, error)
          );
        }
      } else {
        return failed<OrganizationState>(
          null,
          errorDiagnostic('Missing Required Attribute', "Either 'id' or 'domain' must be specified to look up an organization.")
        );
      }

      return succeeded(stateFromOrganization(organization));
    },
  };
}
