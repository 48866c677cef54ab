/**
 * Unit Tests: CLI Output Formatting
 *
 * @see src/utils/output.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { REDACTED } from '../../src/api/logger.js';
import {
  formatDiagnostic,
  formatLabel,
  partitionDiagnostics,
  printResult,
  serialize,
} from '../../src/utils/output.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatLabel', () => {
  it('should split camelCase and upper-case acronyms', () => {
    expect(formatLabel('name')).toBe('Name');
    expect(formatLabel('organizationId')).toBe('Organization ID');
    expect(formatLabel('profilePictureUrl')).toBe('Profile Picture URL');
    expect(formatLabel('idpId')).toBe('IDP ID');
  });
});

describe('diagnostics', () => {
  it('should append field names to the detail', () => {
    expect(
      formatDiagnostic({
        severity: 'error',
        summary: 'Error Creating Organization',
        detail: 'name is required',
        fields: ['name'],
      })
    ).toBe('Error Creating Organization: name is required (fields: name)');
  });

  it('should split errors from warnings', () => {
    expect(
      partitionDiagnostics([
        { severity: 'warning', summary: 'Password Not Imported', detail: 'set it' },
        { severity: 'error', summary: 'Invalid Import ID', detail: 'bad id' },
      ])
    ).toEqual({
      errors: ['Invalid Import ID: bad id'],
      warnings: ['Password Not Imported: set it'],
    });
  });
});

describe('serialize', () => {
  const result = {
    success: true,
    data: { state: { id: 'we_1', secret: 'test-secret', bearerToken: null } },
  };

  it('should mask secrets in JSON output', () => {
    expect(JSON.parse(serialize(result, 'json'))).toEqual({
      success: true,
      data: { state: { id: 'we_1', secret: REDACTED, bearerToken: null } },
    });
  });

  it('should mask secrets in YAML output', () => {
    expect(parseYaml(serialize(result, 'yaml'))).toEqual({
      success: true,
      data: { state: { id: 'we_1', secret: REDACTED, bearerToken: null } },
    });
  });
});

describe('printResult', () => {
  it('should print machine output as a single document', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    printResult({ success: false, message: 'Failed to read workos_user', errors: ['boom'] }, 'json');

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
      success: false,
      message: 'Failed to read workos_user',
      errors: ['boom'],
    });
  });
});
