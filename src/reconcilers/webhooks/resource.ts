/**
 * Webhook resource handler
 *
 * The API no longer serves the webhook endpoints. The lifecycle is kept, but a
 * not-found on create or update is a permanent configuration error and is
 * never retried; a read that finds nothing drops the resource with a warning.
 */

import type { Webhook } from '../../api/types.js';
import { isNotFound } from '../../api/errors.js';
import {
  diagnosticFromError,
  failed,
  succeeded,
  warningDiagnostic,
  type Diagnostic,
} from '../diagnostics.js';
import { ClientSlot, contextLogger, typeNameFor } from '../handler.js';
import { nullIfEmptyList } from '../merge.js';
import type { OperationContext, ResourceHandler } from '../types.js';
import { unknownWebhookEvents } from './events.js';
import type { WebhookConfig, WebhookState } from './types.js';

const SUFFIX = 'webhook';

export const WEBHOOKS_UNSUPPORTED_DETAIL =
  'The WorkOS API no longer serves webhook endpoints; configure webhooks in the WorkOS dashboard';

/**
 * Permanent configuration error for a webhook write that found no endpoint
 */
function unsupported(error: unknown): Diagnostic {
  return diagnosticFromError('Webhooks Not Supported', WEBHOOKS_UNSUPPORTED_DETAIL, error);
}

function eventWarnings(ctx: OperationContext, events: readonly string[]): Diagnostic[] {
  const unknown = unknownWebhookEvents(events);
  const log = contextLogger(ctx, SUFFIX);
  for (const event of unknown) {
    log.warn('Unknown webhook event type', { event });
  }
  return unknown.length > 0
    ? [warningDiagnostic('Unknown Webhook Events', `Not a known event type: ${unknown.join(', ')}`)]
    : [];
}

export function stateFromWebhook(webhook: Webhook, secret: string | null): WebhookState {
  return {
    id: webhook.id,
    url: webhook.url,
    secret,
    enabled: webhook.enabled,
    events: nullIfEmptyList(webhook.events),
    createdAt: webhook.created_at,
    updatedAt: webhook.updated_at,
  };
}

export function createWebhookResource(): ResourceHandler<WebhookConfig, WebhookState> {
  const slot = new ClientSlot(SUFFIX);

  return {
    requiresReplace: [],

    metadata: (providerTypeName) => typeNameFor(providerTypeName, SUFFIX),

    configure(client) {
      slot.set(client);
    },

    async create(ctx, plan) {
      const client = slot.get();
      if (!client) return slot.unconfigured<WebhookState>(null);
      const log = contextLogger(ctx, SUFFIX);
      const warnings = eventWarnings(ctx, plan.events);

      log.debug('Creating webhook', { url: plan.url, events: plan.events });
      try {
        const webhook = await client.webhooks.create(
          { url: plan.url, secret: plan.secret, enabled: plan.enabled ?? true, events: plan.events },
          { signal: ctx.signal }
        );
        log.info('Created webhook', { id: webhook.id });
        return succeeded(stateFromWebhook(webhook, plan.secret), warnings);
      } catch (error) {
        const diagnostic = isNotFound(error)
          ? unsupported(error)
          : diagnosticFromError('Error Creating Webhook', 'Could not create webhook, unexpected error', error);
        return failed<WebhookState>(null, ...warnings, diagnostic);
      }
    },

    async read(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Reading webhook', { id: state.id });
      try {
        const webhook = await client.webhooks.retrieve(state.id, { signal: ctx.signal });
        return succeeded(stateFromWebhook(webhook, state.secret));
      } catch (error) {
        if (isNotFound(error)) {
          log.warn('Webhook not found, removing from state', { id: state.id });
          return succeeded<WebhookState>(null, [
            warningDiagnostic('Webhook Removed From State', `Webhook ${state.id} was not found. ${WEBHOOKS_UNSUPPORTED_DETAIL}.`),
          ]);
        }
        return failed(state, diagnosticFromError('Error Reading Webhook', `Could not read webhook ID ${state.id}`, error));
      }
    },

    async update(ctx, plan, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);
      const warnings = eventWarnings(ctx, plan.events);

      log.debug('Updating webhook', { id: state.id, url: plan.url });
      try {
        const webhook = await client.webhooks.update(
          state.id,
          {
            url: plan.url,
            secret: plan.secret !== state.secret ? plan.secret : undefined,
            enabled: plan.enabled ?? true,
            events: plan.events,
          },
          { signal: ctx.signal }
        );
        log.info('Updated webhook', { id: state.id });
        return succeeded<WebhookState>(
          { ...stateFromWebhook(webhook, plan.secret), id: state.id, createdAt: state.createdAt },
          warnings
        );
      } catch (error) {
        const diagnostic = isNotFound(error)
          ? unsupported(error)
          : diagnosticFromError('Error Updating Webhook', 'Could not update webhook, unexpected error', error);
        return failed(state, ...warnings, diagnostic);
      }
    },

    async delete(ctx, state) {
      const client = slot.get();
      if (!client) return slot.unconfigured(state);
      const log = contextLogger(ctx, SUFFIX);

      log.debug('Deleting webhook', { id: state.id });
      try {
        await client.webhooks.delete(state.id, { signal: ctx.signal });
        log.info('Deleted webhook', { id: state.id });
      } catch (error) {
        if (!isNotFound(error)) {
          return failed(state, diagnosticFromError('Error Deleting Webhook', 'Could not delete webhook, unexpected error', error));
        }
      }
      return succeeded<WebhookState>(null);
    },

    async importState(ctx, id) {
      contextLogger(ctx, SUFFIX).debug('Importing webhook', { id });
      return succeeded<WebhookState>(
        {
          id,
          url: null,
          secret: null,
          enabled: null,
          events: null,
          createdAt: null,
          updatedAt: null,
        },
        [
          warningDiagnostic(
            'Secret Required After Import',
            "The webhook secret is not returned by the API. You must set the 'secret' attribute in your " +
              'configuration to match the original secret, or the resource will be recreated.'
          ),
        ]
      );
    },
  };
}
