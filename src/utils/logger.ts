/**
 * Loan Reconciliation MCP Server - Structured logging
 *
 * Emits JSON log lines to stderr; stdout carries protocol traffic only.
 */

import { LOG_CONFIG, SERVER_NAME } from '../constants.js';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

/**
 * Log level ordering for comparisons.
 */
const LOG_LEVEL_VALUE: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

/**
 * Parse a level name, falling back to INFO.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const levels: LogLevel[] = Object.values(LogLevel);
  return levels.find(level => level === normalized) ?? LogLevel.INFO;
}

/**
 * Log entry shape.
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  traceId?: string;
  durationMs?: number;
  service: string;
}

/**
 * Tool call trace.
 */
interface ToolTrace {
  traceId: string;
  toolName: string;
  startTime: number;
}

type LogSink = (line: string) => void;

/**
 * Logger implementation.
 */
export class Logger {
  private minLevel: LogLevel = parseLogLevel(LOG_CONFIG.DEFAULT_LEVEL);
  private service: string = SERVER_NAME;
  private activeTraces: Map<string, ToolTrace> = new Map();

  constructor(private sink: LogSink = line => process.stderr.write(`${line}\n`)) {}

  /**
   * Set the minimum log level.
   */
  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Redirect log output, e.g. to capture lines in tests.
   */
  setSink(sink: LogSink): void {
    this.sink = sink;
  }

  /**
   * Check whether a level should be logged.
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUE[level] >= LOG_LEVEL_VALUE[this.minLevel];
  }

  /**
   * Generate a trace ID.
   */
  generateTraceId(): string {
    return `trace_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    traceId?: string,
    durationMs?: number
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: this.service,
      ...(context && { context }),
      ...(traceId && { traceId }),
      ...(durationMs !== undefined && { durationMs })
    };

    this.sink(JSON.stringify(entry));
  }

  debug(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.DEBUG, message, context, traceId);
  }

  info(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.INFO, message, context, traceId);
  }

  warn(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.WARN, message, context, traceId);
  }

  error(message: string, context?: Record<string, unknown>, traceId?: string): void {
    this.log(LogLevel.ERROR, message, context, traceId);
  }

  /**
   * Start tool call tracing.
   */
  startToolCall(toolName: string, params?: Record<string, unknown>): string {
    const traceId = this.generateTraceId();
    this.activeTraces.set(traceId, {
      traceId,
      toolName,
      startTime: Date.now()
    });

    this.debug(`Tool call started: ${toolName}`, {
      tool: toolName,
      params: this.sanitizeParams(params)
    }, traceId);

    return traceId;
  }

  /**
   * End tool call tracing. Failures go through `toolError`.
   */
  endToolCall(traceId: string): void {
    const trace = this.activeTraces.get(traceId);
    if (!trace) {
      this.warn('Attempted to end unknown trace', { traceId });
      return;
    }

    const durationMs = Date.now() - trace.startTime;
    this.activeTraces.delete(traceId);

    this.log(
      LogLevel.INFO,
      `Tool call completed: ${trace.toolName}`,
      { tool: trace.toolName },
      traceId,
      durationMs
    );
  }

  /**
   * Record a tool call error.
   */
  toolError(traceId: string, error: Error | string): void {
    const trace = this.activeTraces.get(traceId);
    if (trace) {
      this.activeTraces.delete(traceId);
    }

    this.error(`Tool call error: ${trace?.toolName || 'unknown'}`, {
      tool: trace?.toolName,
      error: error instanceof Error ? error.message : error,
      ...(LOG_CONFIG.INCLUDE_STACK_TRACE && error instanceof Error && { stack: error.stack })
    }, traceId);
  }

  /**
   * Truncate long strings and collapse nested values before logging.
   */
  private sanitizeParams(params?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!params) return undefined;

    const sanitized: Record<string, unknown> = {};
    const MAX_STRING_LENGTH = 500;
    const MAX_ARRAY_LENGTH = 10;

    for (const [key, value] of Object.entries(params)) {
      if (typeof value === 'string') {
        sanitized[key] = value.length > MAX_STRING_LENGTH
          ? `${value.slice(0, MAX_STRING_LENGTH)}... [truncated, ${value.length} chars]`
          : value;
      } else if (Array.isArray(value)) {
        sanitized[key] = value.length > MAX_ARRAY_LENGTH
          ? `[Array of ${value.length} items]`
          : value;
      } else if (typeof value === 'object' && value !== null) {
        sanitized[key] = '[Object]';
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  serverStarted(mode: string, details?: Record<string, unknown>): void {
    this.info('Server started', { mode, ...details });
  }

  serverStopped(reason?: string): void {
    this.info('Server stopped', { reason });
  }

  /**
   * Snapshot publication.
   */
  snapshotPublished(version: number, details: Record<string, unknown>): void {
    this.info('Dataset snapshot published', { version, ...details });
  }

  /**
   * Performance-related logs. Slow operations are raised to WARN.
   */
  performance(operation: string, durationMs: number, details?: Record<string, unknown>): void {
    const level = durationMs > 100 ? LogLevel.WARN : LogLevel.DEBUG;
    this.log(level, `Performance: ${operation}`, details, undefined, durationMs);
  }
}

// Singleton instance.
export const logger = new Logger();
