/**
 * Base class for every error the backup pipeline raises on purpose
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class ConfigurationError extends BackupError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

export class ConnectionError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'connection', cause);
    this.name = 'ConnectionError';
  }
}

export class DumpError extends BackupError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, 'database_dump', cause);
    this.name = 'DumpError';
  }
}

export class ArchiveError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'archive', cause);
    this.name = 'ArchiveError';
  }
}

export class ScheduleValidationError extends BackupError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'schedule_validation');
    this.name = 'ScheduleValidationError';
  }
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
