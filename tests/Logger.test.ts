import winston from 'winston';
import { Logger } from '../src/clients/Logger';
import { LogLevel } from '../src/interfaces/Logger';

const mockWinstonLogger = {
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debug: jest.fn(),
};

// Mock winston to capture log calls
jest.mock('winston', () => ({
  createLogger: jest.fn(() => mockWinstonLogger),
  format: {
    combine: jest.fn(),
    timestamp: jest.fn(),
    errors: jest.fn(),
    colorize: jest.fn(),
    simple: jest.fn(),
  },
  transports: {
    Console: jest.fn(),
  },
}));

describe('Logger', () => {
  let logger: Logger;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = new Logger(LogLevel.DEBUG);
  });

  describe('Basic logging methods', () => {
    it('should log info messages', () => {
      logger.info('Test info message', { key: 'value' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Test info message', { key: 'value' });
    });

    it('should pass undefined metadata through', () => {
      logger.warn('Test warning message');

      expect(mockWinstonLogger.warn).toHaveBeenCalledWith('Test warning message', undefined);
    });

    it('should log error messages with error object', () => {
      const error = new Error('Test error');

      logger.error('Test error message', error, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', {
        key: 'value',
        error: {
          name: 'Error',
          message: 'Test error',
          stack: error.stack,
        },
      });
    });

    it('should include system error details', () => {
      const error = Object.assign(new Error('spawn pg_dump ENOENT'), { code: 'ENOENT', syscall: 'spawn pg_dump' });

      logger.error('Spawn failed', error);

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Spawn failed', {
        error: {
          name: 'Error',
          message: 'spawn pg_dump ENOENT',
          stack: error.stack,
          code: 'ENOENT',
          syscall: 'spawn pg_dump',
        },
      });
    });

    it('should log error messages without error object', () => {
      logger.error('Test error message', undefined, { key: 'value' });

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Test error message', { key: 'value' });
    });

    it('should log debug messages', () => {
      logger.debug('Test debug message', { key: 'value' });

      expect(mockWinstonLogger.debug).toHaveBeenCalledWith('Test debug message', { key: 'value' });
    });
  });

  describe('Sensitive data', () => {
    it('should redact password fields at any depth', () => {
      logger.info('Connecting', {
        connection: { host: 'localhost', password: 'test-secret' },
        PGPASSWORD: 'test-secret',
      });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Connecting', {
        connection: { host: 'localhost', password: '[REDACTED]' },
        PGPASSWORD: '[REDACTED]',
      });
    });

    it('should leave arrays untouched', () => {
      expect(logger.sanitizeMeta({ databases: ['shop', 'crm'] })).toEqual({ databases: ['shop', 'crm'] });
    });
  });

  describe('Specialized logging methods', () => {
    it('should log backup start', () => {
      logger.logBackupStart('shop', { operationId: 'op-1' });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup operation started', {
        operation: 'backup_start',
        databaseName: 'shop',
        operationId: 'op-1',
      });
    });

    it('should log backup completion with size in MB', () => {
      logger.logBackupComplete('/backups/shop_20240115_143045.zip', 1048576, 30000);

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup operation completed successfully', {
        operation: 'backup_complete',
        filePath: '/backups/shop_20240115_143045.zip',
        fileSize: 1048576,
        duration: 30000,
        fileSizeMB: 1,
      });
    });

    it('should log backup errors', () => {
      const error = new Error('pg_dump failed');

      logger.logBackupError('database_dump', error);

      expect(mockWinstonLogger.error).toHaveBeenCalledWith('Backup operation failed: database_dump', {
        operation: 'backup_error',
        failedOperation: 'database_dump',
        error: { name: 'Error', message: 'pg_dump failed', stack: error.stack },
      });
    });

    it('should log configuration with the password redacted', () => {
      logger.logConfigurationStart({ database: 'shop', connection: { password: 'test-secret' } });

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Backup configuration', {
        operation: 'configuration',
        config: { database: 'shop', connection: { password: '[REDACTED]' } },
      });
    });

    it('should log detected filestores', () => {
      logger.logFilestoreDetected('shop', '/data/fs', 'database-config');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Detected filestore: /data/fs', {
        operation: 'filestore_detected',
        databaseName: 'shop',
        strategy: 'database-config',
      });
    });

    it('should log schedule updates', () => {
      logger.logScheduleUpdate('replaced', '0 2 * * * npx odoo-backup --database shop');

      expect(mockWinstonLogger.info).toHaveBeenCalledWith('Crontab reconciled', {
        operation: 'schedule_update',
        status: 'replaced',
        line: '0 2 * * * npx odoo-backup --database shop',
      });
    });
  });

  describe('create', () => {
    it('should use the requested level', () => {
      Logger.create('DEBUG');

      expect(winston.createLogger).toHaveBeenLastCalledWith(expect.objectContaining({ level: 'debug' }));
    });

    it('should fall back to info for unknown levels', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

      Logger.create('verbose');

      expect(warnSpy).toHaveBeenCalledWith('Invalid log level: verbose. Using INFO level.');
      expect(winston.createLogger).toHaveBeenLastCalledWith(expect.objectContaining({ level: 'info' }));
      warnSpy.mockRestore();
    });
  });
});
