/**
 * SQLScope Structured Logging Module
 *
 * Leveled JSON logging with trace IDs carried through async context.
 * Library components take a StructuredLogger and default to a silent one
 * or the process-wide logger.
 *
 * @packageDocumentation
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

// =============================================================================
// Types and Interfaces
// =============================================================================

/**
 * Log levels supported by the structured logger
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric log level values for comparison
 */
export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
} as const;

/**
 * Map log level strings to numeric values
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Check whether a string names a log level
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Get log level from environment variable
 */
export function getLogLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return 'info';
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Log message */
  message: string;
  /** Trace ID for request correlation */
  traceId: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details if logging an error */
  error?: {
    name: string;
    code?: string;
    message: string;
    stack?: string;
  };
}

/**
 * Custom log sink interface
 */
export interface LogSink {
  write(entry: LogEntry): void | Promise<void>;
  flush?(): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Custom log sink */
  sink?: LogSink;
  /** Fallback sink when primary fails */
  fallbackSink?: LogSink;
  /** Whether to include stack traces */
  includeStackTraces?: boolean;
  /** Additional default context */
  defaultContext?: Record<string, unknown>;
  /** Initial trace ID */
  traceId?: string;
}

/**
 * Structured logger interface
 */
export interface StructuredLogger {
  debug(message: string | (() => string), context?: Record<string, unknown>): void;
  info(message: string | (() => string), context?: Record<string, unknown>): void;
  warn(message: string | (() => string), context?: Record<string, unknown>): void;
  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void;

  /** Create a child logger with additional context */
  child(context: Record<string, unknown>): StructuredLogger;

  /** Get the current trace ID */
  getTraceId(): string;

  /** Get the current log level */
  getLevel(): LogLevel;

  /** Set log level at runtime */
  setLevel(level: LogLevel): void;

  /** Number of entries lost because every sink failed */
  getDroppedCount(): number;

  /** Flush any buffered log entries */
  flush(): Promise<void>;
}

// =============================================================================
// Trace Context Propagation
// =============================================================================

/**
 * Context stored in AsyncLocalStorage
 */
interface TraceContextData {
  traceId: string;
}

/**
 * AsyncLocalStorage for trace context propagation
 */
export const LoggerAsyncStorage = new AsyncLocalStorage<TraceContextData>();

/**
 * Run a function with a specific trace context
 */
export async function withTraceContext<T>(
  traceId: string,
  fn: () => T | Promise<T>
): Promise<T> {
  return LoggerAsyncStorage.run({ traceId }, fn);
}

/**
 * Get current trace ID from async context
 */
function getTraceIdFromContext(): string | undefined {
  return LoggerAsyncStorage.getStore()?.traceId;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Safely stringify objects with circular reference handling
 */
function safeStringify(obj: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof obj === 'bigint') {
    return obj.toString();
  }

  if (obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (seen.has(obj)) {
    return '[Circular]';
  }

  seen.add(obj);

  if (Array.isArray(obj)) {
    return obj.map(item => safeStringify(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = safeStringify(value, seen);
  }

  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

/**
 * Read a string `code` property off an error, if it has one
 */
function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Logger Implementation
// =============================================================================

/**
 * Logger implementation
 */
class Logger implements StructuredLogger {
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly fallbackSink?: LogSink;
  private readonly defaultContext: Record<string, unknown>;
  private readonly includeStackTraces: boolean;
  private readonly traceId: string;
  private dropped = 0;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new JsonSink();
    this.fallbackSink = config.fallbackSink;
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this.traceId = config.traceId ?? randomUUID();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private getActiveTraceId(): string {
    // Async context wins over the instance trace ID
    return getTraceIdFromContext() ?? this.traceId;
  }

  private log(
    level: LogLevel,
    messageOrFn: string | (() => string),
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const rawMessage = typeof messageOrFn === 'function' ? messageOrFn() : messageOrFn;

    const mergedContext = context
      ? { ...this.defaultContext, ...context }
      : Object.keys(this.defaultContext).length > 0
        ? this.defaultContext
        : undefined;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, mergedContext),
      traceId: this.getActiveTraceId(),
    };

    if (mergedContext && Object.keys(mergedContext).length > 0) {
      const serialized = safeStringify(mergedContext);
      if (serialized !== null && typeof serialized === 'object' && !Array.isArray(serialized)) {
        entry.context = { ...serialized };
      }
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
      };
      const code = errorCode(error);
      if (code) {
        entry.error.code = code;
      }
      if (this.includeStackTraces && error.stack) {
        entry.error.stack = error.stack;
      }
    }

    try {
      const pending = this.sink.write(entry);
      if (pending instanceof Promise) {
        pending.catch(() => this.writeFallback(entry));
      }
    } catch {
      this.writeFallback(entry);
    }
  }

  private writeFallback(entry: LogEntry): void {
    const fallback = this.fallbackSink;
    if (!fallback) {
      this.dropped++;
      return;
    }
    try {
      const pending = fallback.write(entry);
      if (pending instanceof Promise) {
        pending.catch(() => {
          this.dropped++;
        });
      }
    } catch {
      this.dropped++;
    }
  }

  debug(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string | (() => string), context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string | (() => string), error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  child(context: Record<string, unknown>): StructuredLogger {
    return new Logger({
      level: this.level,
      sink: this.sink,
      fallbackSink: this.fallbackSink,
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this.traceId,
    });
  }

  getTraceId(): string {
    return this.getActiveTraceId();
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getDroppedCount(): number {
    return this.dropped;
  }

  async flush(): Promise<void> {
    if (this.sink.flush) {
      await this.sink.flush();
    }
  }
}

/**
 * Create a new structured logger
 */
export function createLogger(config?: LoggerConfig): StructuredLogger {
  return new Logger(config);
}

// =============================================================================
// Built-in Sinks
// =============================================================================

/**
 * Writes one JSON line per entry. The default destination is stderr so
 * diagnostics never mix with a host program's stdout.
 */
export class JsonSink implements LogSink {
  private readonly writeFn: (json: string) => void;

  constructor(write: (json: string) => void = (json) => process.stderr.write(`${json}\n`)) {
    this.writeFn = write;
  }

  write(entry: LogEntry): void {
    this.writeFn(JSON.stringify(entry));
  }
}

/**
 * Discards every entry
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // discards everything
  }
}

/**
 * Fan-out to several sinks; one failing sink does not stop the others
 */
export class MultiSink implements LogSink {
  private readonly sinks: LogSink[];
  private failures = 0;

  constructor(sinks: LogSink[]) {
    this.sinks = sinks;
  }

  write(entry: LogEntry): void {
    for (const sink of this.sinks) {
      try {
        const pending = sink.write(entry);
        if (pending instanceof Promise) {
          pending.catch(() => {
            this.failures++;
          });
        }
      } catch {
        this.failures++;
      }
    }
  }

  /** Number of individual sink writes that failed */
  getFailureCount(): number {
    return this.failures;
  }

  async flush(): Promise<void> {
    await Promise.all(this.sinks.map(async (sink) => sink.flush?.()));
  }
}

/**
 * Logger that discards everything
 */
export function createSilentLogger(): StructuredLogger {
  return createLogger({ sink: new NoOpSink(), level: 'error' });
}

let defaultLogger: StructuredLogger | undefined;

/**
 * Process-wide logger used when a component is not given one. Level comes
 * from LOG_LEVEL.
 */
export function getDefaultLogger(): StructuredLogger {
  defaultLogger ??= createLogger({ defaultContext: { service: 'sqlscope' } });
  return defaultLogger;
}
