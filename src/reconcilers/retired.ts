/**
 * Resource types the API no longer lets us mutate
 *
 * Connections and directories are created and edited in the WorkOS dashboard.
 * The type names stay registered so configurations that still mention them get
 * a pointer to the dashboard instead of an unknown-type failure.
 */

import { errorDiagnostic, failed, succeeded, warningDiagnostic, type OperationResult } from './diagnostics.js';
import { contextLogger, typeNameFor } from './handler.js';
import type { ResourceHandler } from './types.js';

export const DASHBOARD_URL = 'https://dashboard.workos.com';

export interface RetiredState {
  id: string;
}

/**
 * @param suffix - Type name suffix, e.g. "connection"
 * @param label - Plural display name, e.g. "SSO connections"
 */
export function createRetiredResource(
  suffix: string,
  label: string
): ResourceHandler<Record<string, unknown>, RetiredState> {
  const detail =
    `${label} can no longer be managed through the WorkOS API. ` +
    `Create and edit them in the WorkOS dashboard (${DASHBOARD_URL}) and reference them with the ${suffix} data source.`;

  const refuse = (state: RetiredState | null): OperationResult<RetiredState> =>
    failed(state, errorDiagnostic('Unsupported Resource Type', detail));

  return {
    requiresReplace: [],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, suffix),

    configure() {
      // Nothing to hold: every lifecycle call is refused
    },

    async create() {
      return refuse(null);
    },

    async read(_ctx, state) {
      return refuse(state);
    },

    async update(_ctx, _plan, state) {
      return refuse(state);
    },

    /**
     * Forgets the resource locally; the remote entity is left untouched
     */
    async delete(ctx, state) {
      contextLogger(ctx, suffix).warn('Removing retired resource from state only', { id: state.id });
      return succeeded<RetiredState>(null, [
        warningDiagnostic('Resource Removed From State Only', `${state.id} was not deleted remotely. ${detail}`),
      ]);
    },

    async importState() {
      return refuse(null);
    },
  };
}
