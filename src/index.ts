/**
 * workos-sync library entrypoint
 *
 * The CLI lives in cli.ts; this module exposes the client, handlers and
 * provider registry for hosts that drive the lifecycle themselves.
 */

export * from './api/index.js';
export * as reconcilers from './reconcilers/index.js';
export {
  createProvider,
  createResourceHandlers,
  createDataSourceHandlers,
  qualifyTypeName,
  type Provider,
  type ProviderOptions,
  type ConfigureResult,
} from './provider.js';
export * from './config/index.js';
export { VERSION } from './version.js';
