/**
 * Structured logging with secret redaction
 *
 * Configuration values flow through planner logs (merge decisions,
 * placeholder values), so messages and context are redacted before output:
 * - Values of password/secret/token-like keys are masked
 * - Secret-looking substrings in messages are masked
 * - Human-readable or JSON output for CI/automation
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
  /** Pretty print JSON (default: false) */
  prettyPrint?: boolean;
}

/**
 * Where formatted entries go; defaults to the console
 */
export type LogSink = (level: LogLevel, formatted: string) => void;

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values for redaction
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // Inline credentials in JDBC/HTTP URLs (user:password@host)
  /\/\/[^/\s:@]+:[^/\s@]+@/g,
];

/**
 * Property names whose values are never logged in plaintext. Matched as a
 * substring of the lower-cased key, so `javax.jdo.option.ConnectionPassword`
 * is caught as well.
 */
const SENSITIVE_KEY_FRAGMENTS = ['password', 'secret', 'token', 'credential', 'keytab.pass'];

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Log level numeric values for comparison
 */
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
 * redactString('hunter2hunter2') // 'hunt...ter2'
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
    // Reset lastIndex for global patterns
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

export function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment));
}

/**
 * Redact sensitive values in a value tree (returns a redacted copy)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  // Prevent infinite recursion
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }

  if (typeof value === 'string') {
    return redactPatterns(value);
  }

  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  return redactContext(Object.fromEntries(Object.entries(value)), depth);
}

function redactKeyedValue(key: string, value: unknown, depth: number): unknown {
  if (!isSensitiveKey(key)) {
    return redactValue(value, depth + 1);
  }
  if (typeof value === 'string' && value.length > 0) {
    return redactString(value);
  }
  if (value !== null && value !== undefined) {
    return '[REDACTED]';
  }
  return value;
}

/**
 * Redact a context record
 */
export function redactContext(
  context: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    result[key] = redactKeyedValue(key, value, depth);
  }
  return result;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.toLowerCase());
}

// =============================================================================
// Logger Class
// =============================================================================

const consoleSink: LogSink = (level, formatted) => {
  switch (level) {
    case 'error':
      console.error(formatted);
      break;
    case 'warn':
      console.warn(formatted);
      break;
    default:
      // Keep stdout clean for plan/JSON output
      console.error(formatted);
  }
};

/**
 * Structured logger with automatic secret redaction
 */
export class PlannerLogger {
  private readonly config: Required<LoggerConfig>;
  private readonly baseContext: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(
    config: LoggerConfig = {},
    options: { context?: Record<string, unknown>; sink?: LogSink } = {}
  ) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      prettyPrint: config.prettyPrint ?? false,
    };
    this.baseContext = options.context ?? {};
    this.sink = options.sink ?? consoleSink;
  }

  /**
   * Check if a log level should be output
   */
  isLevelEnabled(level: LogLevel): boolean {
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

    const merged = { ...this.baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
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
  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return this.config.prettyPrint
        ? JSON.stringify(entry, null, 2)
        : JSON.stringify(entry);
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

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.isLevelEnabled(level)) return;
    this.sink(level, this.formatEntry(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): PlannerLogger {
    return new PlannerLogger(this.config, {
      context: { ...this.baseContext, ...context },
      sink: this.sink,
    });
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

/**
 * Default logger instance
 */
export const logger = new PlannerLogger({
  level: parseLogLevel(process.env.UPGRADE_PLANNER_LOG_LEVEL),
  json: process.env.UPGRADE_PLANNER_LOG_JSON === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(
  config: LoggerConfig = {},
  options: { context?: Record<string, unknown>; sink?: LogSink } = {}
): PlannerLogger {
  return new PlannerLogger(config, options);
}
