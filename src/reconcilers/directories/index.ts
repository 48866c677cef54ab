/**
 * Directory sync lookups (read-only)
 *
 * @module reconcilers/directories
 */

export * from './types.js';
export * from './data-source.js';
