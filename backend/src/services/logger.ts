/**
 * Structured logging
 *
 * One line per entry, JSON or text, appended to `${LOG_DIR}/${LOG_FILE}`.
 * Warnings and errors are echoed to stderr; everything else reaches the
 * console only with LOG_CONSOLE=true or at debug level. Bypass sessions pass
 * their session id as the trace id so one grep follows a whole session.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  code?: string | number;
}

export interface LogEntry {
  timestamp: string;
  service: string;
  event: string;
  severity: LogLevel;
  message: string;
  trace_id?: string;
  operation?: string;

  /** Elapsed milliseconds, set by timers */
  duration?: number;
  error?: SerializedError;
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  includeTrace: boolean;
  logDir: string;
  logFile: string;

  /** Overrides keyed by service name, e.g. `detector=debug` */
  serviceLevels: Record<string, LogLevel>;
  console: boolean;
}

export interface PerformanceTimer {
  readonly operation: string;
  end(extra?: Record<string, unknown>): number;
}

// ============================================================================
// Configuration
// ============================================================================

const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.hasOwn(LEVEL_RANK, value);

function parseServiceLevels(raw: string | undefined): Record<string, LogLevel> {
  const levels: Record<string, LogLevel> = {};
  for (const pair of (raw ?? '').split(',')) {
    const [service, level] = pair.split('=').map(part => part.trim());
    const normalized = level?.toLowerCase();
    if (service && isLogLevel(normalized)) {
      levels[service] = normalized;
    }
  }
  return levels;
}

export function readLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    level: isLogLevel(level) ? level : 'info',
    format: env.LOG_FORMAT === 'text' ? 'text' : 'json',
    includeTrace: env.LOG_INCLUDE_TRACE !== 'false',
    logDir: resolve(env.LOG_DIR ?? resolve(process.cwd(), 'var', 'log')),
    logFile: env.LOG_FILE || 'frp-orchestrator.log',
    serviceLevels: parseServiceLevels(env.SERVICE_LOG_LEVELS),
    console: env.LOG_CONSOLE === 'true'
  };
}

// ============================================================================
// Entry shaping
// ============================================================================

const REDACTED_KEY = /secret|token|password/i;

/**
 * Metadata keys that look like credentials never reach the log file.
 */
export function redactMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(metadata).map(([key, value]) => [key, REDACTED_KEY.test(key) ? '[redacted]' : value])
  );
}

export function serializeError(error: Error): SerializedError {
  const code = 'code' in error && (typeof error.code === 'string' || typeof error.code === 'number') ? error.code : undefined;
  return { name: error.name, message: error.message, stack: error.stack, code };
}

function formatText(entry: LogEntry, includeTrace: boolean): string {
  let line = `[${entry.timestamp}] [${entry.severity.toUpperCase()}] ${entry.service} ${entry.event} ${entry.message}`;
  if (includeTrace && entry.trace_id) line += ` [trace:${entry.trace_id}]`;
  if (entry.duration !== undefined) line += ` (${entry.duration}ms)`;
  if (entry.error) line += ` Error: ${entry.error.name}: ${entry.error.message}`;
  if (entry.metadata && Object.keys(entry.metadata).length > 0) line += ` ${JSON.stringify(entry.metadata)}`;
  return line;
}

function formatJson(entry: LogEntry, includeTrace: boolean): string {
  const { trace_id, ...rest } = entry;
  return JSON.stringify(includeTrace && trace_id !== undefined ? { ...rest, trace_id } : rest);
}

// ============================================================================
// Logger
// ============================================================================

class StructuredLogger {
  private config: LoggerConfig = readLoggerConfig();

  enabled(service: string, severity: LogLevel): boolean {
    const threshold = this.config.serviceLevels[service] ?? this.config.level;
    return LEVEL_RANK[severity] >= LEVEL_RANK[threshold];
  }

  emit(entry: LogEntry): void {
    if (!this.enabled(entry.service, entry.severity)) return;

    const shaped = entry.metadata ? { ...entry, metadata: redactMetadata(entry.metadata) } : entry;
    const line =
      this.config.format === 'text' ? formatText(shaped, this.config.includeTrace) : formatJson(shaped, this.config.includeTrace);

    this.append(line);
    this.echo(line, entry.severity);
  }

  getConfig(): LoggerConfig {
    return { ...this.config, serviceLevels: { ...this.config.serviceLevels } };
  }

  updateConfig(updates: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...updates };
  }

  private append(line: string): void {
    const filePath = resolve(this.config.logDir, this.config.logFile);
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      appendFileSync(filePath, `${line}\n`);
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private echo(line: string, severity: LogLevel): void {
    if (severity === 'error') {
      console.error(line);
    } else if (severity === 'warn') {
      console.warn(line);
    } else if (this.config.console || this.config.level === 'debug') {
      console.log(line);
    }
  }
}

const structuredLogger = new StructuredLogger();

/**
 * Logger bound to one service name and, optionally, one trace id.
 */
export class ServiceLogger {
  constructor(
    private readonly service: string,
    private readonly boundTraceId?: string
  ) {}

  /** Same service, every entry tagged with `traceId` unless one is passed explicitly */
  withTrace(traceId: string): ServiceLogger {
    return new ServiceLogger(this.service, traceId);
  }

  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    const qualified = `${this.service}:${operation}`;
    const startedAt = Date.now();
    return {
      operation: qualified,
      end: extra => {
        const duration = Date.now() - startedAt;
        structuredLogger.emit({
          timestamp: new Date().toISOString(),
          service: 'performance-monitor',
          event: 'operation_duration',
          severity: 'debug',
          message: `Operation ${qualified} completed in ${duration}ms`,
          trace_id: traceId ?? this.boundTraceId,
          operation: qualified,
          duration,
          metadata: { ...context, ...extra }
        });
        return duration;
      }
    };
  }

  debug(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.write('debug', event, message, traceId, metadata);
  }

  info(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.write('info', event, message, traceId, metadata);
  }

  warn(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.write('warn', event, message, traceId, metadata);
  }

  error(event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.write('error', event, message, traceId, metadata, error);
  }

  private write(
    severity: LogLevel,
    event: string,
    message: string,
    traceId: string | undefined,
    metadata: Record<string, unknown> | undefined,
    error?: Error
  ): void {
    structuredLogger.emit({
      timestamp: new Date().toISOString(),
      service: this.service,
      event,
      severity,
      message,
      trace_id: traceId ?? this.boundTraceId,
      error: error ? serializeError(error) : undefined,
      metadata
    });
  }
}

export const createServiceLogger = (service: string): ServiceLogger => new ServiceLogger(service);

export interface LoggingSettings {
  level: LogLevel;
  format: LogFormat;
  directory: string;
  file: string;
}

/** Applies the validated `logging` section of the environment config */
export function applyLoggingSettings(settings: LoggingSettings): void {
  structuredLogger.updateConfig({
    level: settings.level,
    format: settings.format,
    logDir: resolve(settings.directory),
    logFile: settings.file
  });
}

export const logger = {
  createServiceLogger,
  getConfig: () => structuredLogger.getConfig(),
  updateConfig: (updates: Partial<LoggerConfig>) => structuredLogger.updateConfig(updates)
};
