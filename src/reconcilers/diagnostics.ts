/**
 * User-visible diagnostics returned by every lifecycle call
 *
 * Handlers never throw: every failure becomes an error diagnostic carrying the
 * summary, the error kind, the remote message and any offending field names.
 */

import { ApiRequestError, errorMessage, type ErrorKind } from '../api/errors.js';

export type Severity = 'error' | 'warning';

export interface Diagnostic {
  severity: Severity;
  /** Short title, e.g. "Error Reading Organization" */
  summary: string;
  detail: string;
  /** Cause category when the failure came from the API */
  kind?: ErrorKind;
  /** Fields named by a validation failure */
  fields?: string[];
}

/**
 * Outcome of a lifecycle call; `state` is null when the resource is gone
 */
export interface OperationResult<TState> {
  state: TState | null;
  diagnostics: Diagnostic[];
}

export function errorDiagnostic(summary: string, detail: string): Diagnostic {
  return { severity: 'error', summary, detail };
}

export function warningDiagnostic(summary: string, detail: string): Diagnostic {
  return { severity: 'warning', summary, detail };
}

/**
 * Turn a thrown value into an error diagnostic
 *
 * @param context - Prefix for the detail, e.g. "Could not read organization ID org_1"
 */
export function diagnosticFromError(summary: string, context: string, error: unknown): Diagnostic {
  const diagnostic = errorDiagnostic(summary, `${context}: ${errorMessage(error)}`);
  if (error instanceof ApiRequestError) {
    diagnostic.kind = error.kind;
    if (error.fields.length > 0) {
      diagnostic.fields = error.fields;
    }
  }
  return diagnostic;
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

export function succeeded<TState>(state: TState | null, diagnostics: Diagnostic[] = []): OperationResult<TState> {
  return { state, diagnostics };
}

/**
 * Failed call; the prior state is kept so the host does not lose track of it
 */
export function failed<TState>(state: TState | null, ...diagnostics: Diagnostic[]): OperationResult<TState> {
  return { state, diagnostics };
}
