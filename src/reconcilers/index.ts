/**
 * Reconcilers module - lifecycle handlers for WorkOS resources
 *
 * Each handler maps declared configuration and persisted state onto calls
 * against the WorkOS API and reports failures as diagnostics.
 *
 * @module reconcilers
 */

export * as organizations from './organizations/index.js';
export * as connections from './connections/index.js';
export * as directories from './directories/index.js';
export * as webhooks from './webhooks/index.js';
export * as users from './users/index.js';
export * as memberships from './memberships/index.js';
export * as roles from './roles/index.js';

export * from './types.js';
export * from './diagnostics.js';
export * from './merge.js';
export { PROVIDER_TYPE_NAME, ClientSlot, contextLogger, typeNameFor } from './handler.js';
export { createRetiredResource, DASHBOARD_URL, type RetiredState } from './retired.js';
