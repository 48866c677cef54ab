/**
 * Terminal output for the workos-sync CLI
 *
 * Command results and states go to stdout as human text, JSON or YAML. Secret
 * attributes (passwords, webhook secrets, directory bearer tokens) are masked
 * in every format.
 */

import chalk from 'chalk';
import { stringify as toYaml } from 'yaml';
import { redactValue } from '../api/logger.js';
import type { Diagnostic } from '../reconcilers/diagnostics.js';
import type { CommandResult, OutputFormat } from '../types.js';

const MAX_VALUE_LENGTH = 50;

/** Words rendered upper-case in state labels */
const ACRONYMS: ReadonlySet<string> = new Set(['Id', 'Url', 'Idp', 'Sso']);

// =============================================================================
// Serialization
// =============================================================================

/**
 * Render a value for --output json|yaml, with secrets masked
 */
export function serialize(value: unknown, format: 'json' | 'yaml'): string {
  const masked = redactValue(value);
  return format === 'yaml' ? toYaml(masked) : JSON.stringify(masked, null, 2);
}

// =============================================================================
// Results and state
// =============================================================================

function printList(title: string, items: readonly string[] | undefined, color: (text: string) => string): void {
  if (!items || items.length === 0) return;
  console.log(color(`\n${title}:`));
  for (const item of items) {
    console.log(color('  •'), item);
  }
}

/**
 * Print the outcome line of a command, then its warnings and errors
 */
export function printResult<T>(result: CommandResult<T>, format: OutputFormat): void {
  if (format !== 'human') {
    console.log(serialize(result, format));
    return;
  }

  console.log(result.success ? chalk.green('✓') : chalk.red('✗'), result.message);
  printList('Warnings', result.warnings, chalk.yellow);
  printList('Errors', result.errors, chalk.red);
}

/**
 * Print a resource or data-source state as "Label: value" rows
 */
export function printState(title: string, state: object | null, format: OutputFormat): void {
  if (format !== 'human') {
    console.log(serialize(state, format));
    return;
  }

  console.log(chalk.bold(`\n${title}:\n`));
  if (state === null) {
    console.log(chalk.gray('  (removed)'));
    return;
  }

  const masked = redactValue(state);
  const rows = typeof masked === 'object' && masked !== null ? Object.entries(masked) : [];
  for (const [key, value] of rows) {
    console.log(`  ${chalk.gray(`${formatLabel(key)}:`)} ${formatValue(value)}`);
  }
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * "Summary: detail", followed by the offending fields when known
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const fields = diagnostic.fields && diagnostic.fields.length > 0 ? ` (fields: ${diagnostic.fields.join(', ')})` : '';
  return `${diagnostic.summary}: ${diagnostic.detail}${fields}`;
}

/**
 * Split diagnostics into the errors/warnings lists of a CommandResult
 */
export function partitionDiagnostics(diagnostics: readonly Diagnostic[]): { errors: string[]; warnings: string[] } {
  return {
    errors: diagnostics.filter((d) => d.severity === 'error').map(formatDiagnostic),
    warnings: diagnostics.filter((d) => d.severity === 'warning').map(formatDiagnostic),
  };
}

// =============================================================================
// Messages
// =============================================================================

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Verbose notes go to stderr so --output json|yaml stays parseable
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    console.error(chalk.gray('[verbose]'), message);
  }
}

export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

// =============================================================================
// Formatting
// =============================================================================

export function formatValue(value: unknown): string {
  if (value === undefined || value === null) {
    return chalk.gray('(none)');
  }
  if (Array.isArray(value)) {
    return value.length === 0 ? chalk.gray('(empty)') : value.map(formatValue).join(', ');
  }
  if (typeof value === 'string') {
    return value.length > MAX_VALUE_LENGTH ? `${value.slice(0, MAX_VALUE_LENGTH)}...` : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * "organizationId" -> "Organization ID"
 */
export function formatLabel(key: string): string {
  return key
    .replace(/([A-Z])/g, ' $1')
    .trim()
    .split(' ')
    .map((word) => {
      const capitalized = word.charAt(0).toUpperCase() + word.slice(1);
      return ACRONYMS.has(capitalized) ? capitalized.toUpperCase() : capitalized;
    })
    .join(' ');
}
