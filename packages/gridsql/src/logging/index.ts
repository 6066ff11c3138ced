/**
 * GridSQL Structured Logging Module
 *
 * Provides structured logging with trace IDs, log levels, JSON output,
 * async context propagation, and configurable sinks.
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

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

/**
 * Compare two log levels
 * @returns negative if a < b, positive if a > b, 0 if equal
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  return LOG_LEVEL_VALUES[a] - LOG_LEVEL_VALUES[b];
}

/**
 * Get log level from the LOG_LEVEL environment variable
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
  level: LogLevel;
  message: string;
  /** Trace ID for query correlation */
  traceId: string;
  context?: Record<string, unknown>;
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
  write(entry: LogEntry): void;
  flush?(): void | Promise<void>;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  sink?: LogSink;
  /** Whether to include stack traces */
  includeStackTraces?: boolean;
  /** Context merged into every entry */
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

  getTraceId(): string;
  setTraceId(traceId: string): void;
  getLevel(): LogLevel;
  setLevel(level: LogLevel): void;

  /** Flush any buffered log entries */
  flush(): Promise<void>;
}

// =============================================================================
// Trace Context Propagation
// =============================================================================

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
export async function withTraceContext<T>(traceId: string, fn: () => T | Promise<T>): Promise<T> {
  return LoggerAsyncStorage.run({ traceId }, fn);
}

function getTraceIdFromContext(): string | undefined {
  return LoggerAsyncStorage.getStore()?.traceId;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Safely stringify objects with circular reference handling
 */
function safeContext(obj: Record<string, unknown>): Record<string, unknown> {
  const seen = new WeakSet<object>();
  const visit = (value: unknown): unknown => {
    if (typeof value === 'bigint') return value.toString();
    if (value === null || typeof value !== 'object') return value;
    if (value instanceof Date) return value.toISOString();
    if (seen.has(value)) return '[Circular]';
    seen.add(value);
    if (Array.isArray(value)) return value.map(visit);
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = visit(inner);
    }
    return result;
  };

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = visit(value);
  }
  return result;
}

/**
 * Format message with placeholder substitution
 * Template syntax: {fieldName}
 */
function formatMessage(template: string, context?: Record<string, unknown>): string {
  if (!context) return template;

  return template.replace(/\{(\w+)\}/g, (match, key: string) => {
    if (key in context) {
      return String(context[key]);
    }
    return match;
  });
}

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

// =============================================================================
// Logger Implementation
// =============================================================================

class Logger implements StructuredLogger {
  private level: LogLevel;
  private sink: LogSink;
  private defaultContext: Record<string, unknown>;
  private includeStackTraces: boolean;
  private _traceId: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level ?? getLogLevelFromEnv();
    this.sink = config.sink ?? new ConsoleSink();
    this.defaultContext = config.defaultContext ?? {};
    this.includeStackTraces = config.includeStackTraces ?? true;
    this._traceId = config.traceId ?? randomUUID();
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.level];
  }

  private getActiveTraceId(): string {
    // Async context wins over the instance trace ID
    return getTraceIdFromContext() ?? this._traceId;
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
    const mergedContext = context ? { ...this.defaultContext, ...context } : this.defaultContext;
    const hasContext = Object.keys(mergedContext).length > 0;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: formatMessage(rawMessage, hasContext ? mergedContext : undefined),
      traceId: this.getActiveTraceId(),
    };

    if (hasContext) {
      entry.context = safeContext(mergedContext);
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

    this.sink.write(entry);
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
      defaultContext: { ...this.defaultContext, ...context },
      includeStackTraces: this.includeStackTraces,
      traceId: this._traceId,
    });
  }

  getTraceId(): string {
    return this.getActiveTraceId();
  }

  setTraceId(traceId: string): void {
    this._traceId = traceId;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
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

export interface ConsoleSinkOptions {
  /** Pretty print JSON */
  prettyPrint?: boolean;
  /** Defaults to stderr so that query output on stdout stays clean */
  stream?: 'stdout' | 'stderr';
}

/**
 * Console sink writing one JSON document per entry
 */
export class ConsoleSink implements LogSink {
  private prettyPrint: boolean;
  private stream: 'stdout' | 'stderr';

  constructor(options: ConsoleSinkOptions = {}) {
    this.prettyPrint = options.prettyPrint ?? false;
    this.stream = options.stream ?? 'stderr';
  }

  write(entry: LogEntry): void {
    const output = this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry);
    if (this.stream === 'stdout') {
      console.log(output);
    } else {
      console.error(output);
    }
  }
}

export interface JsonSinkOptions {
  /** Write function for output */
  write: (json: string) => void;
  prettyPrint?: boolean;
}

/**
 * JSON sink for structured output
 */
export class JsonSink implements LogSink {
  private writeFn: (json: string) => void;
  private prettyPrint: boolean;

  constructor(options: JsonSinkOptions) {
    this.writeFn = options.write;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  write(entry: LogEntry): void {
    this.writeFn(this.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }
}

/**
 * Sink that keeps entries in memory
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * No-op sink
 */
export class NoOpSink implements LogSink {
  write(_entry: LogEntry): void {
    // Intentionally empty
  }
}

/**
 * Logger that drops everything, for embedding without output
 */
export function createSilentLogger(): StructuredLogger {
  return createLogger({ level: 'error', sink: new NoOpSink() });
}
