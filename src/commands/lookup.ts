/**
 * lookup command - Run a data source with key=value lookup arguments.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { partitionDiagnostics, printState } from '../utils/output.js';

export interface LookupOptions {
  /** Data-source type, bare or qualified */
  dataSource: string;
  /** Lookup arguments such as "domain=example.com" */
  pairs: string[];
}

export interface LookupData {
  type: string;
  lookup: Record<string, string>;
  state: unknown;
}

/**
 * Parse "key=value" arguments. The value may itself contain "=".
 *
 * @returns the parsed map, or the first malformed argument
 */
export function parseLookupPairs(
  pairs: readonly string[]
): { ok: true; lookup: Record<string, string> } | { ok: false; invalid: string } {
  const lookup: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      return { ok: false, invalid: pair };
    }
    lookup[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return { ok: true, lookup };
}

export async function lookupCommand(
  ctx: CommandContext,
  options: LookupOptions
): Promise<CommandResult<LookupData>> {
  const { provider, outputFormat } = ctx;
  const handler = provider.dataSource(options.dataSource);
  if (!handler) {
    return {
      success: false,
      message: `Unknown data source: ${options.dataSource}`,
      errors: [`Known data sources: ${provider.dataSourceTypeNames().join(', ')}`],
    };
  }
  const typeName = handler.metadata(provider.typeName).typeName;

  const parsed = parseLookupPairs(options.pairs);
  if (!parsed.ok) {
    return { success: false, message: `Invalid lookup argument "${parsed.invalid}", expected key=value` };
  }

  const unknownKeys = Object.keys(parsed.lookup).filter((key) => !handler.lookupKeys.includes(key));
  if (unknownKeys.length > 0) {
    return {
      success: false,
      message: `Unsupported lookup key(s) for ${typeName}: ${unknownKeys.join(', ')}`,
      errors: [`Supported keys: ${handler.lookupKeys.join(', ')}`],
    };
  }

  const result = await handler.read({ signal: ctx.signal, logger: ctx.logger }, parsed.lookup);
  const { errors, warnings } = partitionDiagnostics(result.diagnostics);
  const success = errors.length === 0;

  if (outputFormat === 'human' && success && result.state !== null && typeof result.state === 'object') {
    printState(typeName, result.state, outputFormat);
  }

  return {
    success,
    message: success ? `Read ${typeName}` : `Failed to read ${typeName}`,
    data: { type: typeName, lookup: parsed.lookup, state: result.state },
    errors: errors.length > 0 ? errors : undefined,
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}
