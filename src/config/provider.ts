/**
 * Provider configuration resolution
 *
 * Each value is taken from explicit configuration first, then from its
 * environment variable:
 * - apiKey   (WORKOS_API_KEY, required)
 * - clientId (WORKOS_CLIENT_ID)
 * - baseUrl  (WORKOS_BASE_URL, defaults to https://api.workos.com)
 */

import { ConfigurationError } from '../api/errors.js';
import { DEFAULT_BASE_URL } from '../api/transport.js';

export const ENV_API_KEY = 'WORKOS_API_KEY';
export const ENV_CLIENT_ID = 'WORKOS_CLIENT_ID';
export const ENV_BASE_URL = 'WORKOS_BASE_URL';

/**
 * Where a resolved value came from
 */
export type ConfigSource = 'explicit' | 'env' | 'default';

/**
 * Explicit provider configuration; an undefined field defers to the environment
 */
export interface ProviderConfigInput {
  apiKey?: string;
  clientId?: string;
  baseUrl?: string;
}

export interface ResolvedProviderConfig {
  apiKey: string;
  clientId?: string;
  baseUrl: string;
  /** Resolution source per field (for debugging; never includes values) */
  sources: {
    apiKey: ConfigSource;
    clientId: ConfigSource;
    baseUrl: ConfigSource;
  };
}

type Environment = Record<string, string | undefined>;

function pick(explicit: string | undefined, envValue: string | undefined): { value: string | undefined; source: ConfigSource } {
  if (explicit !== undefined) return { value: explicit, source: 'explicit' };
  if (envValue !== undefined) return { value: envValue, source: 'env' };
  return { value: undefined, source: 'default' };
}

/**
 * Resolve provider configuration
 *
 * @throws ConfigurationError when no API key is found or the base URL does not parse
 */
export function resolveProviderConfig(
  explicit: ProviderConfigInput = {},
  env: Environment = process.env
): ResolvedProviderConfig {
  const apiKey = pick(explicit.apiKey, env[ENV_API_KEY]);
  const clientId = pick(explicit.clientId, env[ENV_CLIENT_ID]);
  const baseUrl = pick(explicit.baseUrl, env[ENV_BASE_URL]);

  if (!apiKey.value) {
    throw new ConfigurationError(
      'Missing WorkOS API Key',
      'The provider cannot create the WorkOS API client as there is a missing or empty value for the WorkOS API key. ' +
        `Set the apiKey value in the configuration or use the ${ENV_API_KEY} environment variable. ` +
        'If either is already set, ensure the value is not empty.'
    );
  }

  const resolvedBaseUrl = baseUrl.value || DEFAULT_BASE_URL;
  if (!URL.canParse(resolvedBaseUrl)) {
    throw new ConfigurationError('Invalid WorkOS Base URL', `"${resolvedBaseUrl}" is not a valid URL.`);
  }

  return {
    apiKey: apiKey.value,
    clientId: clientId.value || undefined,
    baseUrl: resolvedBaseUrl,
    sources: {
      apiKey: apiKey.source,
      clientId: clientId.source,
      baseUrl: baseUrl.value ? baseUrl.source : 'default',
    },
  };
}
