/**
 * Structured Logger Utility
 *
 * JSON-line logging with secret redaction. Every line goes to stderr so that
 * stdout carries only statement output.
 *
 * @module main/utils/logger
 * @security LM-001: Structured logging with secret redaction
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Additional structured data */
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  version: string;
  context?: unknown;
}

/** What services need from a logger; satisfied by {@link ChildLogger} */
export interface Log {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ============================================================================
// Secret Redaction
// ============================================================================

/**
 * LM-001: Flex tokens travel as the `t` query parameter and occasionally in
 * headers or error text
 */
const SECRET_PATTERNS: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  { pattern: /([?&]t=)[^&\s"]+/g, replacement: '$1[REDACTED]' },
  { pattern: /Bearer\s+[a-zA-Z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /(FLEX_TOKEN|token)(["']?\s*[:=]\s*["']?)[a-zA-Z0-9\-_.]+/gi, replacement: '$1$2[REDACTED]' },
  { pattern: /Authorization["\s:=]+[^\s",}]+/gi, replacement: 'Authorization: "[REDACTED]"' },
];

const SENSITIVE_KEYS = new Set(['token', 'flex_token', 'authorization', 'secret', 'password', 'credentials']);

const MAX_DEPTH = 10;

export function redactString(text: string): string {
  return SECRET_PATTERNS.reduce((result, { pattern, replacement }) => result.replace(pattern, replacement), text);
}

/**
 * Deep copy with secrets masked. Values with a `toJSON` (Decimal, LocalDate)
 * are rendered through it.
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > MAX_DEPTH) return '[MAX_DEPTH_EXCEEDED]';
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') return redactString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value !== 'object') return `[${typeof value}]`;

  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactString(value.message),
      stack: value.stack ? redactString(value.stack) : undefined,
    };
  }
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    return redactValue(value.toJSON(), depth + 1);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : redactValue(entry, depth + 1);
  }
  return result;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

// ============================================================================
// Logger Class
// ============================================================================

class Logger implements Log {
  private readonly version = process.env.npm_package_version || '1.0.0';
  private minLevel: LogLevel;
  private outputClosed = false;

  constructor(private readonly serviceName: string = 'flex-statement') {
    const configured = process.env.FLEX_LOG_LEVEL?.toLowerCase();
    this.minLevel = isLogLevel(configured) ? configured : 'info';
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (this.outputClosed || LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const { service, ...rest }: LogContext = context ?? {};
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactString(message),
      service: service || this.serviceName,
      version: this.version,
    };
    if (Object.keys(rest).length > 0) {
      entry.context = redactValue(rest);
    }

    // A failed stderr write, synchronous or reported to the callback,
    // silences the logger for the rest of the process
    try {
      const stream = process.stderr;
      if (stream && !stream.destroyed) {
        stream.write(`${JSON.stringify(entry)}\n`, (err) => {
          if (err) this.outputClosed = true;
        });
      }
    } catch {
      this.outputClosed = true;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(defaultContext: LogContext): ChildLogger {
    return new ChildLogger(this, defaultContext);
  }
}

/**
 * Child logger with preset context
 */
export class ChildLogger implements Log {
  constructor(
    private readonly parent: Log,
    private readonly defaultContext: LogContext
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, { ...this.defaultContext, ...context });
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, { ...this.defaultContext, ...context });
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, { ...this.defaultContext, ...context });
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, { ...this.defaultContext, ...context });
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

/**
 * Process-wide logger; the command line sets its level from FLEX_LOG_LEVEL
 */
export const logger = new Logger();

/**
 * Create a child logger for a specific service
 */
export function createLogger(service: string): ChildLogger {
  return logger.child({ service });
}
