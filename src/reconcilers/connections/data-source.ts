/**
 * SSO connection data source: lookup by id, or by organization + type
 */

import type { Connection } from '../../api/types.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import { nullIfEmpty } from '../merge.js';
import type { DataSourceHandler } from '../types.js';
import type { ConnectionLookup, ConnectionState } from './types.js';

const SUFFIX = 'connection';

export function stateFromConnection(connection: Connection): ConnectionState {
  return {
    id: connection.id,
    organizationId: connection.organization_id,
    connectionType: connection.connection_type,
    name: connection.name,
    state: connection.state,
    status: nullIfEmpty(connection.status),
    createdAt: connection.created_at,
    updatedAt: connection.updated_at,
  };
}

export function createConnectionDataSource(): DataSourceHandler<ConnectionLookup, ConnectionState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    lookupKeys: ['id', 'organizationId', 'connectionType'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<ConnectionState>(null);
      const log = contextLogger(ctx, SUFFIX);
      const { id, organizationId, connectionType } = lookup;

      if (!id && Boolean(organizationId) !== Boolean(connectionType)) {
        return failed<ConnectionState>(
          null,
          errorDiagnostic(
            'Invalid Attribute Combination',
            "'organizationId' and 'connectionType' must be specified together."
          )
        );
      }

      let connection: Connection;
      if (id) {
        log.debug('Reading connection by ID', { id });
        try {
          connection = await client.connections.retrieve(id, { signal: ctx.signal });
        } catch (error) {
          return failed<ConnectionState>(
            null,
            diagnosticFromError('Error Reading Connection', `Could not read connection ID ${id}`, error)
          );
        }
      } else if (organizationId && connectionType) {
        log.debug('Reading connection by organization and type', { organizationId, connectionType });
        try {
          connection = await client.connections.findByOrganizationAndType(organizationId, connectionType, {
            signal: ctx.signal,
          });
        } catch (error) {
          return failed<ConnectionState>(
            null,
            diagnosticFromError(
              'Error Reading Connection',
              `Could not find connection for organization ${organizationId} with type ${connectionType}`,
              error
            )
          );
        }
      } else {
        return failed<ConnectionState>(
          null,
          errorDiagnostic(
            'Missing Required Attribute',
            "Either 'id' or 'organizationId' with 'connectionType' must be specified to look up a connection."
          )
        );
      }

      return succeeded(stateFromConnection(connection));
    },
  };
}
