import { appendFileSync } from 'fs';
import { resolve } from 'path';

// ============================================================================
// TypeScript Interfaces
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'text';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  /** Emitting component, e.g. "log-collector" or "watch-loop" */
  service: string;
  event: string;
  severity: LogLevel;
  timestamp: string;
  /** Correlates the entries of one operation */
  trace_id?: string;
}

export interface LogRecord extends LogContext {
  message: string;
  /** Milliseconds, set by timers */
  duration?: number;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  includeTrace: boolean;
  /** Optional file that receives a copy of every entry */
  logFile: string | null;
  /** Per-service overrides of `level` */
  serviceLevels: Record<string, LogLevel>;
}

export interface PerformanceTimer {
  startTime: number;
  operation: string;
  traceId?: string;
  /** Log the elapsed time at debug level and return it */
  end(additionalContext?: Record<string, unknown>): number;
}

/**
 * Destination for formatted entries. Diagnostics go to stderr so stdout stays
 * free for command output.
 */
export type LogSink = (formatted: string) => void;

// ============================================================================
// Environment Configuration
// ============================================================================

const isLogLevel = (value: string): value is LogLevel =>
  LEVELS.some(level => level === value);

export const parseServiceLevels = (env?: string): Record<string, LogLevel> => {
  if (!env) return {};

  const levels: Record<string, LogLevel> = {};
  env.split(',').forEach(pair => {
    const [service, level = ''] = pair.trim().split('=');
    const normalized = level.trim();
    if (service && isLogLevel(normalized)) {
      levels[service.trim()] = normalized;
    }
  });
  return levels;
};

export const configFromEnv = (env: NodeJS.ProcessEnv = process.env): LoggerConfig => {
  const level = env.LOG_LEVEL?.toLowerCase() ?? '';
  return {
    level: isLogLevel(level) ? level : 'info',
    format: env.LOG_FORMAT === 'json' ? 'json' : 'text',
    includeTrace: env.LOG_INCLUDE_TRACE !== 'false',
    logFile: env.LOG_FILE ? resolve(env.LOG_FILE) : null,
    serviceLevels: parseServiceLevels(env.SERVICE_LOG_LEVELS)
  };
};

// ============================================================================
// Logger Implementation
// ============================================================================

class StructuredLogger {
  constructor(
    private readonly config: LoggerConfig = configFromEnv(),
    private readonly sink: LogSink = (formatted) => process.stderr.write(formatted + '\n')
  ) {}

  /**
   * Create a performance timer for measuring operation duration
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    const startTime = Date.now();

    return {
      startTime,
      operation,
      traceId,
      end: (additionalContext?: Record<string, unknown>) => {
        const duration = Date.now() - startTime;

        this.logEntry({
          service: 'performance-monitor',
          event: 'operation_duration',
          severity: 'debug',
          timestamp: new Date().toISOString(),
          trace_id: traceId,
          duration,
          message: `Operation ${operation} completed in ${duration}ms`,
          metadata: { operation, ...context, ...additionalContext }
        });

        return duration;
      }
    };
  }

  /**
   * Check if a log level should be filtered out
   */
  private shouldLog(service: string, severity: LogLevel): boolean {
    const configLevel = this.config.serviceLevels[service] ?? this.config.level;
    return LEVELS.indexOf(severity) >= LEVELS.indexOf(configLevel);
  }

  /**
   * Format log entry based on configuration
   */
  format(entry: LogRecord): string {
    if (this.config.format === 'text') {
      const parts = [
        `[${entry.timestamp}]`,
        `[${entry.severity.toUpperCase()}]`,
        entry.service,
        entry.event,
        entry.message
      ];

      if (entry.trace_id && this.config.includeTrace) {
        parts.push(`[trace:${entry.trace_id}]`);
      }

      if (entry.duration !== undefined) {
        parts.push(`(${entry.duration}ms)`);
      }

      let formatted = parts.join(' ');

      if (entry.error) {
        formatted += ` Error: ${entry.error.name}: ${entry.error.message}`;
      }

      if (entry.metadata && Object.keys(entry.metadata).length > 0) {
        formatted += ` ${JSON.stringify(entry.metadata)}`;
      }

      return formatted;
    }

    // JSON format
    const jsonEntry = { ...entry };

    if (!this.config.includeTrace) {
      delete jsonEntry.trace_id;
    }

    return JSON.stringify(jsonEntry);
  }

  /**
   * Write log entry to the sink and the optional log file
   */
  private write(formattedEntry: string): void {
    this.sink(formattedEntry);

    if (this.config.logFile) {
      try {
        appendFileSync(this.config.logFile, formattedEntry + '\n');
      } catch (error) {
        this.sink(`Failed to write to log file: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
  }

  /**
   * Internal log method
   */
  logEntry(entry: LogRecord): void {
    if (!this.shouldLog(entry.service, entry.severity)) {
      return;
    }

    this.write(this.format(entry));
  }

  private emit(
    severity: LogLevel,
    service: string,
    event: string,
    message: string,
    traceId?: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    this.logEntry({
      service,
      event,
      severity,
      timestamp: new Date().toISOString(),
      trace_id: this.config.includeTrace ? traceId : undefined,
      message,
      metadata,
      error: error ? { name: error.name, message: error.message, stack: error.stack } : undefined
    });
  }

  debug(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('debug', service, event, message, traceId, metadata);
  }

  info(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('info', service, event, message, traceId, metadata);
  }

  warn(service: string, event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('warn', service, event, message, traceId, metadata);
  }

  error(service: string, event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.emit('error', service, event, message, traceId, metadata, error);
  }
}

// ============================================================================
// Service-Specific Logger Factory
// ============================================================================

class ServiceLogger {
  constructor(
    private logger: StructuredLogger,
    private serviceName: string
  ) {}

  /**
   * Start a performance timer for this service
   */
  startTimer(operation: string, traceId?: string, context?: Record<string, unknown>): PerformanceTimer {
    return this.logger.startTimer(`${this.serviceName}:${operation}`, traceId, context);
  }

  debug(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.debug(this.serviceName, event, message, traceId, metadata);
  }

  info(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.info(this.serviceName, event, message, traceId, metadata);
  }

  warn(event: string, message: string, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.warn(this.serviceName, event, message, traceId, metadata);
  }

  error(event: string, message: string, error?: Error, traceId?: string, metadata?: Record<string, unknown>): void {
    this.logger.error(this.serviceName, event, message, error, traceId, metadata);
  }
}

// ============================================================================
// Export Instances
// ============================================================================

const structuredLogger = new StructuredLogger();

export const createServiceLogger = (serviceName: string): ServiceLogger => {
  return new ServiceLogger(structuredLogger, serviceName);
};

export { StructuredLogger, ServiceLogger };
