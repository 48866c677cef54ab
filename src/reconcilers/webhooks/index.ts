/**
 * Webhook reconciliation
 *
 * @module reconcilers/webhooks
 */

export * from './types.js';
export * from './events.js';
export * from './resource.js';
