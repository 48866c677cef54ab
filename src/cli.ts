#!/usr/bin/env node
/**
 * workos-sync CLI - Drive single reconciliation calls against WorkOS
 *
 * Commands:
 * - resources: List registered resource and data-source types
 * - import: Import an existing entity and print its state
 * - lookup: Run a data source
 * - destroy: Delete an entity by import identifier
 */

import { Command, Option } from 'commander';
import {
  createCommandContext,
  destroyCommand,
  importCommand,
  lookupCommand,
  resourcesCommand,
} from './commands/index.js';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { error, formatDiagnostic, printResult, verbose as verboseLog } from './utils/output.js';
import { VERSION } from './version.js';

const abort = new AbortController();
process.once('SIGINT', () => abort.abort(new Error('Interrupted')));

/**
 * Shared action body: build context, run, print, exit
 */
async function run<T>(
  label: string,
  command: (ctx: CommandContext) => Promise<CommandResult<T>>,
  needsClient = true
): Promise<void> {
  const options = program.opts<GlobalOptions>();
  const built = createCommandContext(options, { needsClient, signal: abort.signal });
  if (!built.ok) {
    built.diagnostics.forEach((d) => error(formatDiagnostic(d)));
    process.exit(1);
  }
  built.notes.forEach((note) => verboseLog(note, options.verbose));
  const ctx = built.context;

  try {
    const result = await command(ctx);
    printResult(result, ctx.outputFormat);
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`${label} failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('workos-sync')
  .description('Reconcile WorkOS organizations, users, memberships and roles')
  .version(VERSION)
  .addOption(
    new Option('--json', 'Output JSON for CI/automation (same as --output json)')
      .default(false)
  )
  .addOption(
    new Option('--output <format>', 'Output format')
      .choices(['human', 'json', 'yaml'])
      .default('human')
  )
  .addOption(new Option('--base-url <url>', 'WorkOS API base URL (default: WORKOS_BASE_URL)'))
  .addOption(new Option('--client-id <id>', 'WorkOS client ID (default: WORKOS_CLIENT_ID)'))
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * resources command - List registered types
 */
program
  .command('resources')
  .description('List resource and data-source type names')
  .action(async () => {
    await run('Resources', (ctx) => resourcesCommand(ctx), false);
  });

/**
 * import command - Import then read
 */
program
  .command('import')
  .description('Import an existing entity and print its state')
  .argument('<type>', 'Resource type, e.g. organization or workos_organization')
  .argument('<id>', 'Import identifier (roles: organization_id/slug)')
  .action(async (type: string, id: string) => {
    await run('Import', (ctx) => importCommand(ctx, { type, id }));
  });

/**
 * lookup command - Run a data source
 */
program
  .command('lookup')
  .description('Look up an entity through a data source')
  .argument('<dataSource>', 'Data-source type, e.g. organization')
  .argument('[pairs...]', 'Lookup arguments as key=value')
  .action(async (dataSource: string, pairs: string[]) => {
    await run('Lookup', (ctx) => lookupCommand(ctx, { dataSource, pairs }));
  });

/**
 * destroy command - Import then delete
 */
program
  .command('destroy')
  .description('Delete an entity by import identifier (report only without --apply)')
  .argument('<type>', 'Resource type')
  .argument('<id>', 'Import identifier')
  .option('--apply', 'Actually delete (default: report only)')
  .action(async (type: string, id: string, cmdOpts: { apply?: boolean }) => {
    await run('Destroy', (ctx) => destroyCommand(ctx, { type, id, apply: cmdOpts.apply }));
  });

// Parse and execute
await program.parseAsync(process.argv);
