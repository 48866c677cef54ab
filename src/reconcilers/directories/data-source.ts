/**
 * Directory sync data sources: directories, directory users and directory
 * groups. All three are fetch-only projections.
 */

import type { Directory, DirectoryGroup, DirectoryUser } from '../../api/types.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import { nullIfEmpty } from '../merge.js';
import type { DataSourceHandler } from '../types.js';
import type {
  DirectoryGroupLookup,
  DirectoryGroupState,
  DirectoryLookup,
  DirectoryState,
  DirectoryUserLookup,
  DirectoryUserState,
} from './types.js';

// =============================================================================
// Mapping
// =============================================================================

export function stateFromDirectory(directory: Directory): DirectoryState {
  return {
    id: directory.id,
    organizationId: directory.organization_id,
    type: directory.type,
    name: directory.name,
    state: directory.state,
    bearerToken: nullIfEmpty(directory.bearer_token),
    endpoint: nullIfEmpty(directory.endpoint),
    createdAt: directory.created_at,
    updatedAt: directory.updated_at,
  };
}

export function stateFromDirectoryUser(user: DirectoryUser): DirectoryUserState {
  return {
    id: user.id,
    directoryId: user.directory_id,
    organizationId: user.organization_id,
    idpId: user.idp_id,
    firstName: nullIfEmpty(user.first_name),
    lastName: nullIfEmpty(user.last_name),
    email: nullIfEmpty(user.email),
    username: nullIfEmpty(user.username),
    state: user.state,
    createdAt: user.created_at,
    updatedAt: user.updated_at,
  };
}

export function stateFromDirectoryGroup(group: DirectoryGroup): DirectoryGroupState {
  return {
    id: group.id,
    directoryId: group.directory_id,
    organizationId: group.organization_id,
    idpId: group.idp_id,
    name: group.name,
    createdAt: group.created_at,
    updatedAt: group.updated_at,
  };
}

// =============================================================================
// Directory
// =============================================================================

export function createDirectoryDataSource(): DataSourceHandler<DirectoryLookup, DirectoryState> {
  const suffix = 'directory';
  const slot = new ClientSlot(suffix);

  return {
    lookupKeys: ['id', 'organizationId'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, suffix),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<DirectoryState>(null);
      const log = contextLogger(ctx, suffix);
      const { id, organizationId } = lookup;

      let directory: Directory;
      if (id) {
        log.debug('Reading directory by ID', { id });
        try {
          directory = await client.directories.retrieve(id, { signal: ctx.signal });
        } catch (error) {
          return failed<DirectoryState>(null, diagnosticFromError('Error Reading Directory', `Could not read directory ID ${id}`, error));
        }
      } else if (organizationId) {
        log.debug('Reading directory by organization', { organizationId });
        try {
          directory = await client.directories.findByOrganization(organizationId, { signal: ctx.signal });
        } catch (error) {
          return failed<DirectoryState>(
            null,
            diagnosticFromError('Error Reading Directory', `Could not find directory for organization ${organizationId}`, error)
          );
        }
      } else {
        return failed<DirectoryState>(
          null,
          errorDiagnostic('Missing Required Attribute', "Either 'id' or 'organizationId' must be specified to look up a directory.")
        );
      }

      return succeeded(stateFromDirectory(directory));
    },
  };
}

// =============================================================================
// Directory User
// =============================================================================

export function createDirectoryUserDataSource(): DataSourceHandler<DirectoryUserLookup, DirectoryUserState> {
  const suffix = 'directory_user';
  const slot = new ClientSlot(suffix);

  return {
    lookupKeys: ['id', 'directoryId', 'email'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, suffix),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<DirectoryUserState>(null);
      const log = contextLogger(ctx, suffix);
      const { id, directoryId, email } = lookup;

      let user: DirectoryUser;
      if (id) {
        log.debug('Reading directory user by ID', { id });
        try {
          user = await client.directoryUsers.retrieve(id, { signal: ctx.signal });
        } catch (error) {
          return failed<DirectoryUserState>(
            null,
            diagnosticFromError('Error Reading Directory User', `Could not read directory user ID ${id}`, error)
          );
        }
      } else if (directoryId && email) {
        log.debug('Reading directory user by email', { directoryId, email });
        try {
          user = await client.directoryUsers.findByEmail(directoryId, email, { signal: ctx.signal });
        } catch (error) {
          return failed<DirectoryUserState>(
            null,
            diagnosticFromError(
              'Error Reading Directory User',
              `Could not find user with email ${email} in directory ${directoryId}`,
              error
            )
          );
        }
      } else {
        return failed<DirectoryUserState>(
          null,
          errorDiagnostic(
            'Missing Required Attribute',
            "Either 'id' or 'directoryId' with 'email' must be specified to look up a directory user."
          )
        );
      }

      return succeeded(stateFromDirectoryUser(user));
    },
  };
}

// =============================================================================
// Directory Group
// =============================================================================

export function createDirectoryGroupDataSource(): DataSourceHandler<DirectoryGroupLookup, DirectoryGroupState> {
  const suffix = 'directory_group';
  const slot = new ClientSlot(suffix);

  return {
    lookupKeys: ['id', 'directoryId', 'name'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, suffix),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<DirectoryGroupState>(null);
      const log = contextLogger(ctx, suffix);
      const { id, directoryId, name } = lookup;

      let group: DirectoryGroup;
      if (id) {
        log.debug('Reading directory group by ID', { id });
        try {
          group = await client.directoryGroups.retrieve(id, { signal: ctx.signal });
        } catch (error) {
          return failed<DirectoryGroupState>(
            null,
            diagnosticFromError('Error Reading Directory Group', `Could not read directory group ID ${id}`, error)
          );
        }
      } else if (directoryId && name) {
        log.debug('Reading directory group by name', { directoryId, name });
        try {
          group = await client.directoryGroups.findByName(directoryId, name, { signal: ctx.signal });
        } catch (error) {
          return failed<DirectoryGroupState>(
            null,
            diagnosticFromError(
              'Error Reading Directory Group',
              `Could not find group with name ${name} in directory ${directoryId}`,
              error
            )
          );
        }
      } else {
        return failed<DirectoryGroupState>(
          null,
          errorDiagnostic(
            'Missing Required Attribute',
            "Either 'id' or 'directoryId' with 'name' must be specified to look up a directory group."
          )
        );
      }

      return succeeded(stateFromDirectoryGroup(group));
    },
  };
}
