export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;

  // Specialized logging methods for backup operations
  logBackupStart(databaseName: string, meta?: Record<string, unknown>): void;
  logBackupComplete(filePath: string, fileSize: number, duration: number): void;
  logBackupError(operation: string, error: Error, meta?: Record<string, unknown>): void;
  logConfigurationStart(config: Record<string, unknown>): void;
  logFilestoreDetected(databaseName: string, filestorePath: string, strategy: string): void;
  logScheduleUpdate(status: string, line: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
