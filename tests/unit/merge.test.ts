/**
 * Unit Tests: Three-state merge and diagnostics helpers
 *
 * @see src/reconcilers/merge.ts
 * @see src/reconcilers/diagnostics.ts
 */

import { describe, it, expect } from 'vitest';
import { ApiRequestError } from '../../src/api/errors.js';
import {
  diagnosticFromError,
  failed,
  hasErrors,
  succeeded,
  warningDiagnostic,
} from '../../src/reconcilers/diagnostics.js';
import { mergeServerValue, nullIfEmpty, nullIfEmptyList } from '../../src/reconcilers/merge.js';

describe('mergeServerValue', () => {
  it('should take the server value when present', () => {
    expect(mergeServerValue('admin', 'member')).toBe('admin');
  });

  it('should keep the prior value when the server sends nothing', () => {
    expect(mergeServerValue(undefined, 'admin')).toBe('admin');
    expect(mergeServerValue(null, 'admin')).toBe('admin');
    expect(mergeServerValue('', 'admin')).toBe('admin');
  });

  it('should be null when neither side has a value', () => {
    expect(mergeServerValue(undefined, undefined)).toBeNull();
    expect(mergeServerValue('', '')).toBeNull();
    expect(mergeServerValue(null, null)).toBeNull();
  });
});

describe('nullIfEmpty / nullIfEmptyList', () => {
  it('should collapse empty values to null', () => {
    expect(nullIfEmpty('')).toBeNull();
    expect(nullIfEmpty(undefined)).toBeNull();
    expect(nullIfEmpty('x')).toBe('x');
    expect(nullIfEmptyList([])).toBeNull();
    expect(nullIfEmptyList(null)).toBeNull();
    expect(nullIfEmptyList(['a'])).toEqual(['a']);
  });

  it('should copy the list', () => {
    const source = ['a', 'b'];
    const copy = nullIfEmptyList(source);
    source.push('c');
    expect(copy).toEqual(['a', 'b']);
  });
});

describe('diagnostics', () => {
  it('should carry kind and field names from a validation failure', () => {
    const error = new ApiRequestError('Validation failed', 400, {
      errors: [{ field: 'name', message: 'required' }],
    });

    const diagnostic = diagnosticFromError('Error Creating Organization', 'Could not create organization', error);

    expect(diagnostic).toEqual({
      severity: 'error',
      summary: 'Error Creating Organization',
      detail:
        'Could not create organization: WorkOS API error (HTTP 400): Validation failed\n' +
        'Validation errors:\n' +
        '  - name: required',
      kind: 'bad_request',
      fields: ['name'],
    });
  });

  it('should omit kind for errors that did not come from the API', () => {
    const diagnostic = diagnosticFromError('Error Reading User', 'Could not read user', new Error('socket hang up'));
    expect(diagnostic).toEqual({
      severity: 'error',
      summary: 'Error Reading User',
      detail: 'Could not read user: socket hang up',
    });
  });

  it('should tell errors from warnings', () => {
    expect(hasErrors(succeeded({ id: 'x' }, [warningDiagnostic('Heads Up', 'detail')]).diagnostics)).toBe(false);
    expect(hasErrors(failed({ id: 'x' }, diagnosticFromError('Failed', 'ctx', 'boom')).diagnostics)).toBe(true);
  });
});
