/**
 * Command context construction shared by every CLI action
 */

import { createLogger } from '../api/logger.js';
import { createProvider } from '../provider.js';
import type { Diagnostic } from '../reconcilers/diagnostics.js';
import type { CommandContext, GlobalOptions } from '../types.js';

export interface ContextOptions {
  /** False for commands that never call the API (skips configure) */
  needsClient: boolean;
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
}

export type ContextResult =
  | { ok: true; context: CommandContext; notes: string[] }
  | { ok: false; diagnostics: Diagnostic[] };

/**
 * Build the provider and, when the command needs one, configure its client from
 * flags and WORKOS_* environment variables
 */
export function createCommandContext(options: GlobalOptions, ctxOptions: ContextOptions): ContextResult {
  const env = ctxOptions.env ?? process.env;
  const logger = options.verbose ? createLogger({ level: 'debug', json: env.WORKOS_LOG_JSON === 'true' }) : undefined;
  const provider = createProvider();
  const context: CommandContext = {
    options,
    outputFormat: options.json ? 'json' : options.output,
    provider,
    signal: ctxOptions.signal,
    logger,
  };

  if (!ctxOptions.needsClient) {
    return { ok: true, context, notes: [] };
  }

  const configured = provider.configure({ baseUrl: options.baseUrl, clientId: options.clientId, logger }, env);
  if (!configured.ok) {
    return { ok: false, diagnostics: configured.diagnostics };
  }

  return {
    ok: true,
    context,
    notes: [`API key from ${configured.config.sources.apiKey}, base URL ${configured.config.baseUrl}`],
  };
}
