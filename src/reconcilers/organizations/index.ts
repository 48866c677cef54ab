/**
 * Organization reconciliation
 *
 * @module reconcilers/organizations
 */

export * from './types.js';
export * from './resource.js';
export * from './data-source.js';
