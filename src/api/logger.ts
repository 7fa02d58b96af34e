/**
 * JSON logging with secret redaction for the gateway client
 *
 * Security requirements:
 * - Never log admin tokens or other secrets in plaintext
 * - Redact sensitive headers (Authorization, Kong-Admin-Token)
 * - Support structured JSON logging for CI/automation
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Context merged into every entry */
  context?: Record<string, unknown>;
}

// =============================================================================
// Constants
// =============================================================================

const SENSITIVE_PATTERNS = [
  /Bearer\s+[a-zA-Z0-9._~+/=-]+/gi,
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,
  /secret[_-]?[a-zA-Z0-9]{10,}/gi,
  /token[_-]?[a-zA-Z0-9]{10,}/gi,
];

/**
 * Header names that should have their values redacted
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'kong-admin-token',
  'x-api-key',
  'cookie',
  'set-cookie',
  'proxy-authorization',
]);

/**
 * Object keys (lower-cased) that should have their values redacted
 */
const SENSITIVE_KEYS = new Set([
  'apikey',
  'api_key',
  'password',
  'secret',
  'token',
  'admin_token',
  'access_token',
  'accesstoken',
  'authorization',
  'credentials',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('Bearer abcdef123456') // 'Bear...3456'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in an arbitrary value (deep copy)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  if (value !== null && typeof value === 'object') {
    return redactObject(Object.fromEntries(Object.entries(value)), depth + 1);
  }
  return value;
}

/**
 * Redact sensitive keys of a record (deep copy)
 */
export function redactObject(
  obj: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)) {
      if (typeof value === 'string' && value.length > 0) {
        result[key] = redactString(value);
      } else if (value !== null && value !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = value;
      }
    } else {
      result[key] = redactValue(value, depth + 1);
    }
  }
  return result;
}

/**
 * Redact sensitive headers from a plain header record
 */
export function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key] = SENSITIVE_HEADERS.has(key.toLowerCase())
      ? redactString(value)
      : redactPatterns(value);
  }
  return result;
}

/**
 * Parse a log level from an environment value; unknown values yield undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  switch (value?.toLowerCase()) {
    case 'debug':
      return 'debug';
    case 'info':
      return 'info';
    case 'warn':
      return 'warn';
    case 'error':
      return 'error';
    default:
      return undefined;
  }
}

// =============================================================================
// Logger Class
// =============================================================================

/**
 * Secure logger with JSON output and automatic secret redaction
 *
 * Log lines go to stderr so that plan output and `--json` results on
 * stdout stay machine-readable.
 */
export class ApiLogger {
  private config: Required<LoggerConfig>;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      context: config.context ?? {},
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.config.context, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactObject(merged);
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private output(level: LogLevel, entry: LogEntry): void {
    if (!this.shouldLog(level)) return;
    console.error(this.formatEntry(entry));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.output('debug', this.createEntry('debug', message, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.output('info', this.createEntry('info', message, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.output('warn', this.createEntry('warn', message, context));
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.output('error', this.createEntry('error', message, context, error));
  }

  /**
   * Log an HTTP request (with redacted sensitive data)
   */
  request(
    method: string,
    url: string,
    options?: { headers?: Record<string, string>; body?: unknown }
  ): void {
    this.debug('HTTP Request', {
      method,
      url: redactPatterns(url),
      headers: options?.headers ? redactHeaders(options.headers) : undefined,
      body: options?.body === undefined ? undefined : redactValue(options.body),
    });
  }

  /**
   * Log an HTTP response; 4xx/5xx are logged at warn, except 404 which the
   * client treats as "absent"
   */
  response(status: number, url: string, options?: { durationMs?: number }): void {
    const level: LogLevel = status >= 400 && status !== 404 ? 'warn' : 'debug';
    this.output(
      level,
      this.createEntry(level, `HTTP Response ${status}: ${redactPatterns(url)}`, {
        status,
        durationMs: options?.durationMs,
      })
    );
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): ApiLogger {
    return new ApiLogger({
      ...this.config,
      context: { ...this.config.context, ...context },
    });
  }

  getConfig(): Required<LoggerConfig> {
    return { ...this.config };
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

export const logger = new ApiLogger({
  level: parseLogLevel(process.env.GATESYNC_LOG_LEVEL),
  json: process.env.GATESYNC_LOG_JSON === 'true',
});

export function createLogger(config: LoggerConfig = {}): ApiLogger {
  return new ApiLogger(config);
}
