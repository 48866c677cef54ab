/**
 * destroy command - Delete a remote entity by import identifier.
 *
 * Reports only, unless --apply is given.
 */

import { hasErrors, type Diagnostic } from '../reconcilers/diagnostics.js';
import type { CommandContext, CommandResult } from '../types.js';
import { partitionDiagnostics, printState, warn } from '../utils/output.js';

export interface DestroyOptions {
  type: string;
  id: string;
  /** Actually delete (default: report only) */
  apply?: boolean;
}

export interface DestroyData {
  type: string;
  /** State found before deletion */
  state: unknown;
  deleted: boolean;
}

export async function destroyCommand(
  ctx: CommandContext,
  options: DestroyOptions
): Promise<CommandResult<DestroyData>> {
  const { provider, outputFormat } = ctx;
  const handler = provider.resource(options.type);
  if (!handler) {
    return {
      success: false,
      message: `Unknown resource type: ${options.type}`,
      errors: [`Known resource types: ${provider.resourceTypeNames().join(', ')}`],
    };
  }
  const typeName = handler.metadata(provider.typeName).typeName;
  const opCtx = { signal: ctx.signal, logger: ctx.logger };

  const imported = await handler.importState(opCtx, options.id);
  const diagnostics: Diagnostic[] = [...imported.diagnostics];
  const state = imported.state;

  let deleted = false;
  if (!hasErrors(diagnostics) && state !== null) {
    if (outputFormat === 'human' && typeof state === 'object') {
      printState(typeName, state, outputFormat);
    }

    if (options.apply) {
      const removed = await handler.delete(opCtx, state);
      diagnostics.push(...removed.diagnostics);
      deleted = !hasErrors(removed.diagnostics) && removed.state === null;
    } else if (outputFormat === 'human') {
      warn('Report only: re-run with --apply to delete');
    }
  }

  const { errors, warnings } = partitionDiagnostics(diagnostics);
  const success = errors.length === 0 && state !== null;

  let message: string;
  if (!success) {
    message = `Failed to destroy ${typeName} ${options.id}`;
  } else if (deleted) {
    message = `Deleted ${typeName} ${options.id}`;
  } else {
    message = `Would delete ${typeName} ${options.id}`;
  }

  return {
    success,
    message,
    data: { type: typeName, state, deleted },
    errors: errors.length > 0 ? errors : undefined,
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}
