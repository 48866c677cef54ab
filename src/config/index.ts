/**
 * Configuration module exports
 */

export {
  resolveProviderConfig,
  ENV_API_KEY,
  ENV_CLIENT_ID,
  ENV_BASE_URL,
  type ConfigSource,
  type ProviderConfigInput,
  type ResolvedProviderConfig,
} from './provider.js';
