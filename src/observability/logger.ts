/**
 * Logger implementations for the Pinecone client.
 *
 * Provides NoopLogger and ConsoleLogger with structured logging and auto-redaction.
 */

import { LogLevel, type LogEntry, type Logger } from './types.js';

// ============================================================================
// NoopLogger Implementation
// ============================================================================

/**
 * No-op logger implementation, the client default
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _context?: Record<string, unknown>): void {
    // No-op
  }

  setLevel(_level: LogLevel): void {
    // No-op
  }
}

// ============================================================================
// ConsoleLogger Implementation
// ============================================================================

/**
 * Console logger options
 */
export interface ConsoleLoggerOptions {
  /** Logger name/component */
  name?: string;
  /** Log level */
  level?: LogLevel;
  /** Use JSON output instead of formatted text */
  json?: boolean;
  /** Custom sensitive field names to redact */
  sensitiveFields?: string[];
}

const DEFAULT_SENSITIVE_FIELDS = [
  'apiKey',
  'api-key',
  'api_key',
  'token',
  'password',
  'secret',
  'authorization',
];

/**
 * Console logger with level filtering and redaction of credentials.
 * Numeric arrays are summarized as `[vector:N]`.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel = LogLevel.Info;
  private readonly name: string;
  private readonly json: boolean;
  private readonly sensitiveFields: Set<string>;

  constructor(options?: ConsoleLoggerOptions) {
    this.name = options?.name ?? 'pinecone';
    this.json = options?.json ?? false;

    if (options?.level !== undefined) {
      this.level = options.level;
    }

    this.sensitiveFields = new Set(
      [...DEFAULT_SENSITIVE_FIELDS, ...(options?.sensitiveFields ?? [])].map((f) => f.toLowerCase())
    );
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const safeContext = context ? this.redact(context) : undefined;
    const logFn = this.getLogFunction(level);

    if (this.json) {
      const entry: LogEntry & { component: string } = {
        level,
        message,
        timestamp: Date.now(),
        context: safeContext,
        component: this.name,
      };
      logFn(JSON.stringify(entry));
      return;
    }

    const levelStr = LogLevel[level]?.toUpperCase() ?? 'UNKNOWN';
    const line = `${new Date().toISOString()} ${levelStr} [${this.name}] ${message}`;
    if (safeContext && Object.keys(safeContext).length > 0) {
      logFn(line, safeContext);
    } else {
      logFn(line);
    }
  }

  private getLogFunction(level: LogLevel): (...args: unknown[]) => void {
    switch (level) {
      case LogLevel.Error:
        return console.error;
      case LogLevel.Warn:
        return console.warn;
      case LogLevel.Debug:
        return console.debug;
      default:
        return console.log;
    }
  }

  /**
   * Returns a copy of `obj` with sensitive keys replaced by `[REDACTED]`
   */
  redact(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (this.isSensitiveKey(key)) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = this.redactValue(value);
      }
    }

    return result;
  }

  private redactValue(value: unknown): unknown {
    if (Array.isArray(value)) {
      if (value.length > 0 && typeof value[0] === 'number') {
        return `[vector:${value.length}]`;
      }
      return value.map((item) => this.redactValue(item));
    }
    if (isRecord(value)) {
      return this.redact(value);
    }
    return value;
  }

  private isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    for (const sensitive of this.sensitiveFields) {
      if (lowerKey.includes(sensitive)) {
        return true;
      }
    }
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Create a logger based on configuration
 */
export function createLogger(options?: {
  enabled?: boolean;
  level?: LogLevel;
  json?: boolean;
  name?: string;
}): Logger {
  if (options?.enabled === false) {
    return new NoopLogger();
  }

  return new ConsoleLogger({
    name: options?.name ?? 'pinecone',
    level: options?.level ?? LogLevel.Info,
    json: options?.json ?? false,
  });
}
