import winston from 'winston';
import { Logger as ILogger, LogLevel } from '../interfaces/Logger';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'pgpassword'];

/**
 * Winston-backed logger; metadata is redacted before it reaches a transport
 */
export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true })
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
      ],
    });
  }

  /**
   * Sanitize metadata to remove sensitive information
   */
  sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
    const sanitized: Record<string, unknown> = { ...meta };

    for (const [key, value] of Object.entries(sanitized)) {
      const lowerKey = key.toLowerCase();
      const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

      if (isSensitive) {
        sanitized[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        sanitized[key] = this.sanitizeMeta(value);
      }
    }

    return sanitized;
  }

  /**
   * Log info message
   */
  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta && this.sanitizeMeta(meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta && this.sanitizeMeta(meta));
  }

  /**
   * Log error message with optional error object
   */
  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const errorMeta: Record<string, unknown> = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...errorDetails(error),
        },
      }),
    };
    this.winston.error(message, this.sanitizeMeta(errorMeta));
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta && this.sanitizeMeta(meta));
  }

  /**
   * Log backup operation start
   */
  logBackupStart(databaseName: string, meta?: Record<string, unknown>): void {
    this.info('Backup operation started', {
      operation: 'backup_start',
      databaseName,
      ...meta,
    });
  }

  /**
   * Log backup operation completion
   */
  logBackupComplete(filePath: string, fileSize: number, duration: number): void {
    this.info('Backup operation completed successfully', {
      operation: 'backup_complete',
      filePath,
      fileSize,
      duration,
      fileSizeMB: Math.round((fileSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(operation: string, error: Error, meta?: Record<string, unknown>): void {
    this.error(`Backup operation failed: ${operation}`, error, {
      operation: 'backup_error',
      failedOperation: operation,
      ...meta,
    });
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.info('Backup configuration', {
      operation: 'configuration',
      config,
    });
  }

  logFilestoreDetected(databaseName: string, filestorePath: string, strategy: string): void {
    this.info(`Detected filestore: ${filestorePath}`, {
      operation: 'filestore_detected',
      databaseName,
      strategy,
    });
  }

  logScheduleUpdate(status: string, line: string): void {
    this.info('Crontab reconciled', {
      operation: 'schedule_update',
      status,
      line,
    });
  }

  /**
   * Create a logger from an explicit level, falling back to LOG_LEVEL
   */
  static create(level: string | undefined = process.env.LOG_LEVEL): Logger {
    const logLevel = level?.toLowerCase();
    if (!logLevel) {
      return new Logger(LogLevel.INFO);
    }

    const known = Object.values(LogLevel).find(value => value === logLevel);
    if (!known) {
      console.warn(`Invalid log level: ${level}. Using INFO level.`);
      return new Logger(LogLevel.INFO);
    }

    return new Logger(known);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Node system error properties worth keeping in the log
 */
function errorDetails(error: Error): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  for (const key of ['code', 'errno', 'syscall', 'path'] as const) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (value !== undefined) {
        details[key] = value;
      }
    }
  }
  return details;
}
