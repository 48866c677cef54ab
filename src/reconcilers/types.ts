/**
 * Lifecycle contract between the host and the reconciliation handlers
 *
 * The host drives one call at a time per resource instance. Each call resolves
 * with the new state (null once the resource is gone) and diagnostics.
 */

import type { WorkOSClient } from '../api/client.js';
import type { ApiLogger } from '../api/logger.js';
import type { OperationResult } from './diagnostics.js';

export interface OperationContext {
  /** Cancels in-flight requests and retry waits */
  signal?: AbortSignal;
  /** Defaults to the module logger */
  logger?: ApiLogger;
}

export interface HandlerMetadata {
  /** Fully qualified type name, e.g. "workos_organization" */
  typeName: string;
}

/**
 * Resource with a full Create/Read/Update/Delete/Import lifecycle
 */
export interface ResourceHandler<TConfig, TState> {
  /** Attributes whose change forces delete + recreate */
  readonly requiresReplace: readonly string[];

  metadata(providerTypeName: string): HandlerMetadata;
  configure(client: WorkOSClient): void;

  create(ctx: OperationContext, plan: TConfig): Promise<OperationResult<TState>>;
  read(ctx: OperationContext, state: TState): Promise<OperationResult<TState>>;
  update(ctx: OperationContext, plan: TConfig, state: TState): Promise<OperationResult<TState>>;
  delete(ctx: OperationContext, state: TState): Promise<OperationResult<TState>>;
  importState(ctx: OperationContext, id: string): Promise<OperationResult<TState>>;
}

/**
 * Read-only lookup from a set of keys to a fetched entity
 */
export interface DataSourceHandler<TLookup extends Record<string, string | undefined>, TState> {
  /** Keys the lookup accepts */
  readonly lookupKeys: readonly string[];

  metadata(providerTypeName: string): HandlerMetadata;
  configure(client: WorkOSClient): void;

  read(ctx: OperationContext, lookup: TLookup): Promise<OperationResult<TState>>;
}

export type AnyResourceHandler = ResourceHandler<unknown, unknown>;
export type AnyDataSourceHandler = DataSourceHandler<Record<string, string | undefined>, unknown>;
