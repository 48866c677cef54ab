/**
 * Organization membership reconciliation
 *
 * @module reconcilers/memberships
 */

export * from './types.js';
export * from './resource.js';
