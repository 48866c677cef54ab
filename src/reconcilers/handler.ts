/**
 * Small helpers shared by every handler factory
 */

import type { WorkOSClient } from '../api/client.js';
import { logger as defaultLogger, type ApiLogger } from '../api/logger.js';
import { errorDiagnostic, failed, type OperationResult } from './diagnostics.js';
import type { HandlerMetadata, OperationContext } from './types.js';

export const PROVIDER_TYPE_NAME = 'workos';

export function typeNameFor(providerTypeName: string, suffix: string): HandlerMetadata {
  return { typeName: `${providerTypeName}_${suffix}` };
}

/**
 * Logger for one lifecycle call, tagged with the resource type
 */
export function contextLogger(ctx: OperationContext, suffix: string): ApiLogger {
  return (ctx.logger ?? defaultLogger).child({ type: `${PROVIDER_TYPE_NAME}_${suffix}` });
}

/**
 * Holds the client handed over by configure()
 */
export class ClientSlot {
  private client?: WorkOSClient;

  constructor(private readonly suffix: string) {}

  set(client: WorkOSClient): void {
    this.client = client;
  }

  get(): WorkOSClient | undefined {
    return this.client;
  }

  /**
   * Failure returned when a lifecycle call arrives before configure()
   */
  unconfigured<TState>(state: TState | null): OperationResult<TState> {
    return failed(
      state,
      errorDiagnostic(
        'Unconfigured API Client',
        `The ${PROVIDER_TYPE_NAME}_${this.suffix} handler was called before the provider was configured.`
      )
    );
  }
}
