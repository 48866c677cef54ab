/**
 * User data source: lookup by id or by email
 */

import type { User } from '../../api/types.js';
import { diagnosticFromError, errorDiagnostic, failed, succeeded } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import type { DataSourceHandler } from '../types.js';
import { stateFromUser } from './resource.js';
import type { UserLookup, UserState } from './types.js';

const SUFFIX = 'user';

export function createUserDataSource(): DataSourceHandler<UserLookup, UserState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    lookupKeys: ['id', 'email'],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async read(ctx, lookup) {
      const client = slot.get();
      if (!client) return slot.unconfigured<UserState>(null);
      const log = contextLogger(ctx, SUFFIX);

      const { id, email } = lookup;
      if (!id && !email) {
        return failed<UserState>(
          null,
          errorDiagnostic('Missing Required Attribute', "Either 'id' or 'email' must be specified to look up a user.")
        );
      }

      let user: User;
      try {
        if (id) {
          log.debug('Reading user by ID', { id });
          user = await client.users.retrieve(id, { signal: ctx.signal });
        } else {
          log.debug('Reading user by email', { email });
          user = await client.users.findByEmail(email ?? '', { signal: ctx.signal });
        }
      } catch (error) {
        return failed<UserState>(null, diagnosticFromError('Error Reading User', 'Could not read user', error));
      }

      return succeeded(stateFromUser(user));
    },
  };
}
