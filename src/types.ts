/**
 * Shared types and interfaces for the workos-sync CLI
 */

import type { ApiLogger } from './api/logger.js';
import type { Provider } from './provider.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json' | 'yaml';

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Shorthand for --output json */
  json: boolean;
  /** Output format */
  output: OutputFormat;
  /** WorkOS API base URL (falls back to WORKOS_BASE_URL) */
  baseUrl?: string;
  /** WorkOS client ID (falls back to WORKOS_CLIENT_ID) */
  clientId?: string;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Context passed to each command
 */
export interface CommandContext {
  options: GlobalOptions;
  outputFormat: OutputFormat;
  /** Configured provider */
  provider: Provider;
  /** Cancels in-flight API calls */
  signal?: AbortSignal;
  /** Logger handed to every lifecycle call */
  logger?: ApiLogger;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  warnings?: string[];
}
