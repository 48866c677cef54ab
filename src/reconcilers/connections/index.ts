/**
 * SSO connection lookups (read-only)
 *
 * @module reconcilers/connections
 */

export * from './types.js';
export * from './data-source.js';
