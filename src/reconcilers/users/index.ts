/**
 * User reconciliation
 *
 * @module reconcilers/users
 */

export * from './types.js';
export * from './resource.js';
export * from './data-source.js';
