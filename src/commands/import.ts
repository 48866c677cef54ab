/**
 * import command - Bring an existing remote entity under management.
 *
 * Runs importState followed by a read, the same sequence a host performs
 * before it first persists an imported resource.
 */

import { hasErrors, type Diagnostic } from '../reconcilers/diagnostics.js';
import type { CommandContext, CommandResult } from '../types.js';
import { partitionDiagnostics, printState } from '../utils/output.js';

export interface ImportOptions {
  /** Resource type, bare ("organization") or qualified ("workos_organization") */
  type: string;
  /** Import identifier; roles take "organization_id/slug" */
  id: string;
}

export interface ImportData {
  type: string;
  state: unknown;
}

export async function importCommand(
  ctx: CommandContext,
  options: ImportOptions
): Promise<CommandResult<ImportData>> {
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
  let state = imported.state;

  if (!hasErrors(diagnostics) && state !== null) {
    const refreshed = await handler.read(opCtx, state);
    diagnostics.push(...refreshed.diagnostics);
    state = refreshed.state;
  }

  const { errors, warnings } = partitionDiagnostics(diagnostics);
  const success = errors.length === 0 && state !== null;

  if (outputFormat === 'human' && success && state !== null && typeof state === 'object') {
    printState(typeName, state, outputFormat);
  }

  return {
    success,
    message: success
      ? `Imported ${typeName} ${options.id}`
      : `Failed to import ${typeName} ${options.id}`,
    data: { type: typeName, state },
    errors: errors.length > 0 ? errors : undefined,
    warnings: warnings.length > 0 ? warnings : undefined,
  };
}
