/**
 * Error taxonomy for the WorkOS API
 *
 * Every non-2xx response becomes an ApiRequestError tagged with an ErrorKind.
 * Callers branch on the kind through the predicates below, never on raw status
 * codes, so the status-to-kind mapping lives in one place.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Semantic error kinds
 */
export type ErrorKind =
  | 'not_found'
  | 'unauthorized'
  | 'forbidden'
  | 'bad_request'
  | 'conflict'
  | 'rate_limited'
  | 'internal_server'
  | 'unspecified';

/**
 * Per-field validation failure reported by the API
 */
export interface FieldError {
  field: string;
  code?: string;
  message: string;
}

/**
 * Shape of an API error body
 */
interface ErrorBody {
  message?: string;
  code?: string;
  errors?: FieldError[];
}

// =============================================================================
// Status mapping
// =============================================================================

/**
 * Map an HTTP status to its error kind
 */
export function kindForStatus(status: number): ErrorKind {
  switch (status) {
    case 400:
      return 'bad_request';
    case 401:
      return 'unauthorized';
    case 403:
      return 'forbidden';
    case 404:
      return 'not_found';
    case 409:
      return 'conflict';
    case 429:
      return 'rate_limited';
    default:
      return status >= 500 ? 'internal_server' : 'unspecified';
  }
}

/**
 * Human-readable message used when the response body carries none
 */
export function defaultMessageForStatus(status: number): string {
  switch (status) {
    case 400:
      return 'The request was invalid or malformed';
    case 401:
      return 'Invalid API key or authentication failed';
    case 403:
      return 'Access denied to this resource';
    case 404:
      return 'The requested resource was not found';
    case 409:
      return 'The resource already exists or conflicts with existing data';
    case 422:
      return 'The request was well-formed but contained invalid data';
    case 429:
      return 'Rate limit exceeded, please retry later';
    default:
      return status >= 500
        ? 'WorkOS service encountered an internal error'
        : `Unexpected error (HTTP ${status})`;
  }
}

// =============================================================================
// Error classes
// =============================================================================

/**
 * Error raised for any non-2xx API response
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly errors: FieldError[];
  public readonly kind: ErrorKind;
  /** Message as returned by the API (or the status default) */
  public readonly apiMessage: string;

  constructor(
    message: string,
    status: number,
    options?: {
      code?: string;
      errors?: FieldError[];
      kind?: ErrorKind;
    }
  ) {
    const errors = options?.errors ?? [];
    super(formatErrorMessage(status, message, options?.code, errors));
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options?.code;
    this.errors = errors;
    this.kind = options?.kind ?? kindForStatus(status);
    this.apiMessage = message;
  }

  /**
   * Names of the fields that failed validation
   */
  get fields(): string[] {
    return this.errors.map((e) => e.field);
  }
}

/**
 * Invalid provider configuration (missing API key, unusable base URL)
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly detail?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Malformed import identifier, raised before any network call
 */
export class ImportIdError extends Error {
  constructor(
    public readonly id: string,
    public readonly expected: string
  ) {
    super(`Expected import identifier with format: ${expected}. Got: "${id}"`);
    this.name = 'ImportIdError';
  }
}

function formatErrorMessage(
  status: number,
  message: string,
  code: string | undefined,
  errors: FieldError[]
): string {
  let result = code
    ? `WorkOS API error (HTTP ${status}) [${code}]: ${message}`
    : `WorkOS API error (HTTP ${status}): ${message}`;

  if (errors.length > 0) {
    result += '\nValidation errors:';
    for (const fieldError of errors) {
      result += fieldError.code
        ? `\n  - ${fieldError.field} [${fieldError.code}]: ${fieldError.message}`
        : `\n  - ${fieldError.field}: ${fieldError.message}`;
    }
  }

  return result;
}

// =============================================================================
// Construction
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseErrorBody(text: string): ErrorBody | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) return undefined;

  const body: ErrorBody = {};
  if (typeof parsed.message === 'string') body.message = parsed.message;
  if (typeof parsed.code === 'string') body.code = parsed.code;
  if (Array.isArray(parsed.errors)) {
    body.errors = parsed.errors.filter(isRecord).map((entry) => ({
      field: typeof entry.field === 'string' ? entry.field : '',
      code: typeof entry.code === 'string' ? entry.code : undefined,
      message: typeof entry.message === 'string' ? entry.message : '',
    }));
  }
  return body;
}

/**
 * Build an ApiRequestError from a status and the raw response body
 *
 * A body that is not JSON becomes the message verbatim. A JSON body without a
 * message falls back to the per-status default.
 */
export function parseApiError(status: number, bodyText: string): ApiRequestError {
  const body = bodyText ? parseErrorBody(bodyText) : undefined;

  if (body === undefined) {
    const message = bodyText || defaultMessageForStatus(status);
    return new ApiRequestError(message, status);
  }

  return new ApiRequestError(body.message || defaultMessageForStatus(status), status, {
    code: body.code,
    errors: body.errors,
  });
}

/**
 * Synthetic not-found error for lookups that match nothing
 */
export function notFoundError(message: string): ApiRequestError {
  return new ApiRequestError(message, 404, { code: 'not_found' });
}

// =============================================================================
// Predicates
// =============================================================================

function hasKind(error: unknown, kind: ErrorKind): boolean {
  return error instanceof ApiRequestError && error.kind === kind;
}

export function isNotFound(error: unknown): boolean {
  return hasKind(error, 'not_found');
}

export function isUnauthorized(error: unknown): boolean {
  return hasKind(error, 'unauthorized');
}

export function isForbidden(error: unknown): boolean {
  return hasKind(error, 'forbidden');
}

export function isBadRequest(error: unknown): boolean {
  return hasKind(error, 'bad_request');
}

export function isConflict(error: unknown): boolean {
  return hasKind(error, 'conflict');
}

export function isRateLimited(error: unknown): boolean {
  return hasKind(error, 'rate_limited');
}

export function isInternalServerError(error: unknown): boolean {
  return hasKind(error, 'internal_server');
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
