/**
 * User resource handler
 *
 * Update always resends email_verified: an email change resets verification
 * server-side, and the desired value must be re-asserted in the same call.
 * Password fields are write-only and carried over from configuration.
 */

import type { UpdateUserRequest, User } from '../../api/types.js';
import { isNotFound } from '../../api/errors.js';
import { diagnosticFromError, failed, succeeded, warningDiagnostic } from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import { isPresent, mergeServerValue, nullIfEmpty } from '../merge.js';
import type { ResourceHandler } from '../types.js';
import type { UserConfig, UserState } from './types.js';

const SUFFIX = 'user';

/**
 * Server-owned fields of a user; write-only fields come from `prior`
 */
export function stateFromUser(user: User, prior?: Partial<UserState>): UserState {
  return {
    id: user.id,
    email: user.email,
    emailVerified: user.email_verified,
    firstName: nullIfEmpty(user.first_name),
    lastName: nullIfEmpty(user.last_name),
    password: prior?.password ?? null,
    passwordHash: prior?.passwordHash ?? null,
    passwordHashType: prior?.passwordHashType ?? null,
    profilePictureUrl: nullIfEmpty(user.profile_picture_url),
    createdAt: user.created_at,
    updatedAt: user.updated_at,
  };
}

/**
 * Build the update payload: changed fields plus email_verified, always
 */
export function buildUserUpdate(plan: UserConfig, state: UserState): UpdateUserRequest {
  const request: UpdateUserRequest = {
    emailVerified: plan.emailVerified ?? state.emailVerified ?? false,
  };

  if (plan.email !== state.email) {
    request.email = plan.email;
  }
  if ((plan.firstName ?? null) !== state.firstName && isPresent(plan.firstName)) {
    request.firstName = plan.firstName;
  }
  if ((plan.lastName ?? null) !== state.lastName && isPresent(plan.lastName)) {
    request.lastName = plan.lastName;
  }
  if ((plan.password ?? null) !== state.password && isPresent(plan.password)) {
    request.password = plan.password;
  }
  if ((plan.passwordHash ?? null) !== state.passwordHash && isPresent(plan.passwordHash)) {
    request.passwordHash = plan.passwordHash;
    request.passwordHashType = plan.passwordHashType ?? undefined;
  }

  return request;
}

function writeOnlyFields(plan: UserConfig): Pick<UserState, 'password' | 'passwordHash' | 'passwordHashType'> {
  return {
    password: plan.password ?? null,
    passwordHash: plan.passwordHash ?? null,
    passwordHashType: plan.passwordHashType ?? null,
  };
}

export function createUserResource(): ResourceHandler<UserConfig, UserState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    requiresReplace: [],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async create(ctx, plan) {
      const client = slot.get();
      if (!client) return slot.unconfigured<UserState>(null);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Creating user', { email: plan.email });
      try {
        const user = await client.users.create(
          {
            email: plan.email,
            emailVerified: plan.emailVerified ?? false,
            firstName: plan.firstName ?? undefined,
            lastName: plan.lastName ?? undefined,
            password: plan.password ?? undefined,
            passwordHash: plan.passwordHash ?? undefined,
            passwordHashType: plan.passwordHashType ?? undefined,
          },
          { signal: ctx.signal }
        );
        log.info('Created user', { id: user.id, email: user.email });

        return succeeded<UserState>({
          ...stateFromUser(user, writeOnlyFields(plan)),
          firstName: mergeServerValue(user.first_name, plan.firstName),
          lastName: mergeServerValue(user.last_name, plan.lastName),
        });
      } catch (error) {
        return failed<UserState>(null, diagnosticFromError('Error Creating User', 'Could not create user, unexpected error', error));
      }
    },

    async read(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Reading user', { id: state.id });
      try {
        const user = await client.users.retrieve(state.id, { signal: ctx.signal });
        return succeeded(stateFromUser(user, state));
      } catch (error) {
        if (isNotFound(error)) {
          log.info('User not found, removing from state', { id: state.id });
          return succeeded<UserState>(null);
        }
        return failed(state, diagnosticFromError('Error Reading User', `Could not read user ID ${state.id}`, error));
      }
    },

    async update(ctx, plan, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Updating user', { id: state.id, email: plan.email });
      try {
        const user = await client.users.update(state.id, buildUserUpdate(plan, state), { signal: ctx.signal });
        log.info('Updated user', { id: state.id });

        return succeeded<UserState>({
          ...stateFromUser(user, writeOnlyFields(plan)),
          id: state.id,
          firstName: mergeServerValue(user.first_name, plan.firstName),
          lastName: mergeServerValue(user.last_name, plan.lastName),
          createdAt: state.createdAt,
        });
      } catch (error) {
        return failed(state, diagnosticFromError('Error Updating User', 'Could not update user, unexpected error', error));
      }
    },

    async delete(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Deleting user', { id: state.id });
      try {
        await client.users.delete(state.id, { signal: ctx.signal });
        log.info('Deleted user', { id: state.id });
      } catch (error) {
        if (!isNotFound(error)) {
          return failed(state, diagnosticFromError('Error Deleting User', 'Could not delete user, unexpected error', error));
        }
      }
      return succeeded<UserState>(null);
    },

    async importState(ctx, id) {
      contextLogger(ctx, SUFFIX).debug('Importing user', { id });
      return succeeded<UserState>(
        {
          id,
          email: null,
          emailVerified: null,
          firstName: null,
          lastName: null,
          password: null,
          passwordHash: null,
          passwordHashType: null,
          profilePictureUrl: null,
          createdAt: null,
          updatedAt: null,
        },
        [
          warningDiagnostic(
            'Password Not Imported',
            "The user's password cannot be imported from the API. If password authentication is required, " +
              "you must set the 'password' attribute in your configuration."
          ),
        ]
      );
    },
  };
}
