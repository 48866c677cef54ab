/**
 * Structured logging for the WorkOS client and the reconciliation handlers
 *
 * Every line goes to stderr (warn to console.warn) so stdout stays reserved for
 * command output. Context passes through redaction before it is rendered: the
 * API key, passwords, password hashes, webhook secrets and directory bearer
 * tokens never reach a log line.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: { name: string; message: string };
}

export interface LoggerConfig {
  /** Minimum level written (default: info) */
  level?: LogLevel;
  /** One JSON object per line instead of the bracketed human format */
  json?: boolean;
  /** Prefix human lines with the timestamp (default: true) */
  timestamps?: boolean;
}

// =============================================================================
// Redaction
// =============================================================================

export const REDACTED = '[REDACTED]';

/** WorkOS secret keys, bearer credentials and JWTs embedded in free text */
const SECRET_PATTERNS: readonly RegExp[] = [
  /sk_[a-zA-Z0-9_]{8,}/g,
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
];

/** Matched case-insensitively, ignoring "_" and "-" */
const SECRET_KEYS: ReadonlySet<string> = new Set([
  'apikey',
  'authorization',
  'proxyauthorization',
  'cookie',
  'setcookie',
  'xapikey',
  'password',
  'passwordhash',
  'secret',
  'clientsecret',
  'token',
  'accesstoken',
  'bearertoken',
]);

const MAX_DEPTH = 10;

function isSecretKey(key: string): boolean {
  return SECRET_KEYS.has(key.toLowerCase().replace(/[_-]/g, ''));
}

/**
 * Replace every secret-looking substring
 *
 * @example
 * redactPatterns('Authorization: Bearer test-secret') // 'Authorization: [REDACTED]'
 */
export function redactPatterns(text: string): string {
  return SECRET_PATTERNS.reduce((result, pattern) => result.replace(pattern, REDACTED), text);
}

/**
 * Deep copy with secret-named keys replaced; absent values stay absent
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) return '[MAX_DEPTH]';
  if (typeof value === 'string') return redactPatterns(value);
  if (typeof value !== 'object' || value === null) return value;
  if (Array.isArray(value)) return value.map((item) => redactValue(item, depth + 1));

  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [
      key,
      isSecretKey(key) && entry !== null && entry !== undefined ? REDACTED : redactValue(entry, depth + 1),
    ])
  );
}

/**
 * Header values are redacted whole when the name is sensitive
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [name, isSecretKey(name) ? REDACTED : redactPatterns(value)])
  );
}

function redactContext(context: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(context).map(([key, value]) => [
      key,
      isSecretKey(key) && value !== null && value !== undefined ? REDACTED : redactValue(value, 1),
    ])
  );
}

// =============================================================================
// Rendering
// =============================================================================

const NOT_FOUND_STATUS = 404;

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Resolved at call time so test spies on console take effect
const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.error(line),
  info: (line) => console.error(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

function renderHuman(record: LogRecord, timestamps: boolean): string {
  const parts = [
    ...(timestamps ? [`[${record.timestamp}]`] : []),
    `[${record.level.toUpperCase()}]`,
    record.message,
  ];
  if (record.context && Object.keys(record.context).length > 0) {
    parts.push(JSON.stringify(record.context));
  }
  if (record.error) {
    parts.push(`\n  Error: ${record.error.name}: ${record.error.message}`);
  }
  return parts.join(' ');
}

// =============================================================================
// Logger
// =============================================================================

export class ApiLogger {
  private readonly config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, baseContext: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
    };
    this.baseContext = baseContext;
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>, cause?: Error): void {
    if (SEVERITY[level] < SEVERITY[this.config.level]) return;

    const record: LogRecord = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };
    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      record.context = redactContext(merged);
    }
    if (cause) {
      record.error = { name: cause.name, message: redactPatterns(cause.message) };
    }

    WRITERS[level](this.config.json ? JSON.stringify(record) : renderHuman(record, this.config.timestamps));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>, cause?: Error): void {
    this.write('error', message, context, cause);
  }

  /**
   * One outgoing HTTP attempt; headers are redacted before logging
   */
  request(method: string, url: string, details: { headers?: Record<string, string>; attempt?: number } = {}): void {
    this.write('debug', 'HTTP Request', {
      method,
      url,
      headers: details.headers ? redactHeaders(details.headers) : undefined,
      attempt: details.attempt,
    });
  }

  /**
   * Status of one HTTP attempt; failures are logged at warn, except 404, which
   * handlers recover from (drop from state, repeated delete)
   */
  response(status: number, url: string, details: { durationMs?: number } = {}): void {
    const level: LogLevel = status >= 400 && status !== NOT_FOUND_STATUS ? 'warn' : 'debug';
    this.write(level, `HTTP Response ${status}: ${url}`, {
      status,
      durationMs: details.durationMs,
    });
  }

  /**
   * Same output settings, with extra context on every line
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger(this.config, { ...this.baseContext, ...context });
  }
}

// =============================================================================
// Defaults
// =============================================================================

function levelFromEnv(value: string | undefined): LogLevel | undefined {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' ? value : undefined;
}

/**
 * Module logger, tuned through WORKOS_LOG_LEVEL and WORKOS_LOG_JSON
 */
export const logger = new ApiLogger({
  level: levelFromEnv(process.env.WORKOS_LOG_LEVEL) ?? 'warn',
  json: process.env.WORKOS_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
