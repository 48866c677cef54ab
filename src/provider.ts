/**
 * Provider registry
 *
 * Resolves configuration, builds the single shared API client and hands it to
 * every registered resource and data-source handler.
 */

import { createClient, type WorkOSClient } from './api/client.js';
import { ConfigurationError } from './api/errors.js';
import { logger as defaultLogger, type ApiLogger } from './api/logger.js';
import type { RetryConfig } from './api/types.js';
import { resolveProviderConfig, type ProviderConfigInput, type ResolvedProviderConfig } from './config/index.js';
import { createConnectionDataSource } from './reconcilers/connections/index.js';
import { errorDiagnostic, type Diagnostic } from './reconcilers/diagnostics.js';
import {
  createDirectoryDataSource,
  createDirectoryGroupDataSource,
  createDirectoryUserDataSource,
} from './reconcilers/directories/index.js';
import { PROVIDER_TYPE_NAME } from './reconcilers/handler.js';
import { createMembershipResource } from './reconcilers/memberships/index.js';
import { createOrganizationDataSource, createOrganizationResource } from './reconcilers/organizations/index.js';
import { createRetiredResource } from './reconcilers/retired.js';
import { createRoleDataSource, createRoleResource } from './reconcilers/roles/index.js';
import type { AnyDataSourceHandler, AnyResourceHandler } from './reconcilers/types.js';
import { createUserDataSource, createUserResource } from './reconcilers/users/index.js';
import { createWebhookResource } from './reconcilers/webhooks/index.js';

// =============================================================================
// Handler lists
// =============================================================================

/**
 * Resource handlers, in registration order
 */
export function createResourceHandlers(): AnyResourceHandler[] {
  return [
    createOrganizationResource(),
    createRetiredResource('connection', 'SSO connections'),
    createRetiredResource('directory', 'Directory sync directories'),
    createWebhookResource(),
    createUserResource(),
    createMembershipResource(),
    createRoleResource(),
  ];
}

/**
 * Data-source handlers, in registration order
 */
export function createDataSourceHandlers(): AnyDataSourceHandler[] {
  return [
    createOrganizationDataSource(),
    createConnectionDataSource(),
    createDirectoryDataSource(),
    createDirectoryUserDataSource(),
    createDirectoryGroupDataSource(),
    createUserDataSource(),
    createRoleDataSource(),
  ];
}

// =============================================================================
// Provider
// =============================================================================

export interface ProviderOptions extends ProviderConfigInput {
  timeout?: number;
  retry?: RetryConfig;
  fetch?: typeof fetch;
  logger?: ApiLogger;
}

export type ConfigureResult =
  | { ok: true; config: ResolvedProviderConfig; diagnostics: Diagnostic[] }
  | { ok: false; diagnostics: Diagnostic[] };

export interface Provider {
  readonly typeName: string;
  readonly resources: readonly AnyResourceHandler[];
  readonly dataSources: readonly AnyDataSourceHandler[];

  /**
   * Resolve configuration and hand a client to every handler.
   * A configuration failure is reported as a diagnostic; handlers stay unconfigured.
   */
  configure(options?: ProviderOptions, env?: Record<string, string | undefined>): ConfigureResult;

  /** The client built by the last successful configure() */
  client(): WorkOSClient | undefined;

  resource(typeName: string): AnyResourceHandler | undefined;
  dataSource(typeName: string): AnyDataSourceHandler | undefined;
  resourceTypeNames(): string[];
  dataSourceTypeNames(): string[];
}

/**
 * Accept both "organization" and "workos_organization"
 */
export function qualifyTypeName(providerTypeName: string, name: string): string {
  return name.startsWith(`${providerTypeName}_`) ? name : `${providerTypeName}_${name}`;
}

export function createProvider(typeName: string = PROVIDER_TYPE_NAME): Provider {
  const resources = createResourceHandlers();
  const dataSources = createDataSourceHandlers();

  const resourceIndex = new Map(resources.map((h) => [h.metadata(typeName).typeName, h]));
  const dataSourceIndex = new Map(dataSources.map((h) => [h.metadata(typeName).typeName, h]));

  let current: WorkOSClient | undefined;

  return {
    typeName,
    resources,
    dataSources,

    configure(options = {}, env = process.env) {
      const log = (options.logger ?? defaultLogger).child({ provider: typeName });

      let config: ResolvedProviderConfig;
      try {
        config = resolveProviderConfig(options, env);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          return { ok: false, diagnostics: [errorDiagnostic(error.message, error.detail ?? error.message)] };
        }
        throw error;
      }

      log.debug('Creating WorkOS API client', { baseUrl: config.baseUrl, sources: config.sources });

      current = createClient({
        apiKey: config.apiKey,
        clientId: config.clientId,
        baseUrl: config.baseUrl,
        timeout: options.timeout,
        retry: options.retry,
        fetch: options.fetch,
        logger: options.logger,
      });

      for (const handler of resources) handler.configure(current);
      for (const handler of dataSources) handler.configure(current);

      log.info('Configured WorkOS client', { baseUrl: config.baseUrl });
      return { ok: true, config, diagnostics: [] };
    },

    client: () => current,

    resource: (name) => resourceIndex.get(qualifyTypeName(typeName, name)),
    dataSource: (name) => dataSourceIndex.get(qualifyTypeName(typeName, name)),
    resourceTypeNames: () => [...resourceIndex.keys()],
    dataSourceTypeNames: () => [...dataSourceIndex.keys()],
  };
}
