/**
 * Shared Logger - structured JSON logging for position-audit packages
 *
 * Each entry is written as one JSON line to the console method matching its
 * level. Components get their own singleton via `Logger.getInstance`.
 */

import { randomUUID } from 'crypto';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

export type LogMetadata = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  correlationId?: string;
  component?: string;
  operation?: string;
  duration?: number;
  metadata?: LogMetadata;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

export interface LoggerConfig {
  level: LogLevel;
  component: string;
  enableConsole: boolean;
  enablePerformanceLogging: boolean;
  maxStackTraceLines: number;
}

/**
 * Performance timer for operation tracking
 */
export interface PerformanceTimer {
  operation: string;
  startTime: number;
  correlationId?: string;
  metadata?: LogMetadata;
}

const parseLogLevel = (raw: string | undefined): LogLevel => {
  switch ((raw ?? 'INFO').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'FATAL':
      return LogLevel.FATAL;
    default:
      return LogLevel.INFO;
  }
};

const readErrorCode = (error: Error): string | number | undefined => {
  if ('code' in error) {
    const code: unknown = error.code;
    if (typeof code === 'string' || typeof code === 'number') return code;
  }
  return undefined;
};

export class Logger {
  private readonly config: LoggerConfig;
  private static instances: Map<string, Logger> = new Map();
  private readonly activeTimers: Map<string, PerformanceTimer> = new Map();

  constructor(config: LoggerConfig) {
    this.config = config;
  }

  /**
   * Create logger configuration from environment variables
   */
  static createConfigFromEnv(
    component: string,
    env: NodeJS.ProcessEnv = process.env,
  ): LoggerConfig {
    const maxStackLines = parseInt(env.LOG_MAX_STACK_LINES || '10', 10);
    return {
      level: parseLogLevel(env.LOG_LEVEL),
      component,
      enableConsole: env.LOG_ENABLE_CONSOLE !== 'false',
      enablePerformanceLogging: env.LOG_ENABLE_PERFORMANCE !== 'false',
      maxStackTraceLines: Number.isNaN(maxStackLines) ? 10 : maxStackLines,
    };
  }

  /**
   * Get or create the logger for a component
   */
  static getInstance(component: string = 'position-audit'): Logger {
    const existing = Logger.instances.get(component);
    if (existing) return existing;

    const logger = new Logger(Logger.createConfigFromEnv(component));
    Logger.instances.set(component, logger);
    return logger;
  }

  static generateCorrelationId(): string {
    return randomUUID();
  }

  private formatError(error: Error): LogEntry['error'] {
    const stackLines = error.stack?.split('\n').slice(0, this.config.maxStackTraceLines);
    return {
      name: error.name,
      message: error.message,
      stack: stackLines?.join('\n'),
      code: readErrorCode(error),
    };
  }

  private createLogEntry(
    level: LogLevel,
    message: string,
    correlationId?: string,
    operation?: string,
    duration?: number,
    metadata?: LogMetadata,
    error?: Error,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      component: this.config.component,
    };
    if (correlationId) entry.correlationId = correlationId;
    if (operation) entry.operation = operation;
    if (duration !== undefined) entry.duration = duration;
    if (metadata) entry.metadata = metadata;
    if (error) entry.error = this.formatError(error);
    return entry;
  }

  private writeLog(entry: LogEntry): void {
    if (!this.config.enableConsole) return;

    const logString = JSON.stringify(entry);
    switch (entry.level) {
      case 'DEBUG':
        console.debug(logString);
        break;
      case 'INFO':
        console.info(logString);
        break;
      case 'WARN':
        console.warn(logString);
        break;
      case 'ERROR':
      case 'FATAL':
        console.error(logString);
        break;
      default:
        console.log(logString);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    this.writeLog(
      this.createLogEntry(LogLevel.DEBUG, message, correlationId, undefined, undefined, metadata),
    );
  }

  info(message: string, correlationId?: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    this.writeLog(
      this.createLogEntry(LogLevel.INFO, message, correlationId, undefined, undefined, metadata),
    );
  }

  warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    this.writeLog(
      this.createLogEntry(LogLevel.WARN, message, correlationId, undefined, undefined, metadata),
    );
  }

  error(message: string, error?: Error, correlationId?: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;
    this.writeLog(
      this.createLogEntry(
        LogLevel.ERROR,
        message,
        correlationId,
        undefined,
        undefined,
        metadata,
        error,
      ),
    );
  }

  fatal(message: string, error?: Error, correlationId?: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.FATAL)) return;
    this.writeLog(
      this.createLogEntry(
        LogLevel.FATAL,
        message,
        correlationId,
        undefined,
        undefined,
        metadata,
        error,
      ),
    );
  }

  // Performance Logging
  startTimer(operation: string, correlationId?: string, metadata?: LogMetadata): string {
    const timerId = randomUUID();
    this.activeTimers.set(timerId, {
      operation,
      startTime: Date.now(),
      correlationId,
      metadata,
    });
    if (this.config.enablePerformanceLogging) {
      this.debug(`Started operation: ${operation}`, correlationId, {
        timerId,
        ...metadata,
      });
    }
    return timerId;
  }

  endTimer(timerId: string, additionalMetadata?: LogMetadata): number | null {
    const timer = this.activeTimers.get(timerId);
    if (!timer) {
      this.warn(`Timer not found: ${timerId}`);
      return null;
    }
    const duration = Date.now() - timer.startTime;
    this.activeTimers.delete(timerId);
    if (this.config.enablePerformanceLogging && this.shouldLog(LogLevel.DEBUG)) {
      this.writeLog(
        this.createLogEntry(
          LogLevel.DEBUG,
          `Completed operation: ${timer.operation}`,
          timer.correlationId,
          timer.operation,
          duration,
          { timerId, ...timer.metadata, ...additionalMetadata },
        ),
      );
    }
    return duration;
  }
}
