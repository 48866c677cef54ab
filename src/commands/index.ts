/**
 * Command exports
 */

export { createCommandContext, type ContextOptions, type ContextResult } from './context.js';
export { resourcesCommand, type ResourcesData } from './resources.js';
export { importCommand, type ImportOptions, type ImportData } from './import.js';
export { lookupCommand, parseLookupPairs, type LookupOptions, type LookupData } from './lookup.js';
export { destroyCommand, type DestroyOptions, type DestroyData } from './destroy.js';
