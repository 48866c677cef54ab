/**
 * Organization role reconciliation
 *
 * @module reconcilers/roles
 */

export * from './types.js';
export * from './resource.js';
export * from './data-source.js';
