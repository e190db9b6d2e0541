import { promises as fs } from 'fs';
import { dirname } from 'path';
import { ConnectionParameters } from '../interfaces/BackupConfig';
import { CommandRunner } from '../interfaces/CommandRunner';
import { DatabaseExporter, DumpInfo } from '../interfaces/DatabaseExporter';
import { Logger } from '../interfaces/Logger';
import { DumpError, formatError, toError } from '../errors';

export const PG_DUMP = 'pg_dump';

/**
 * Database exporter driving the external pg_dump utility
 */
export class PgDumpExporter implements DatabaseExporter {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger
  ) {}

  /**
   * Dump one database to a plain SQL file with pg_dump.
   * The password travels in PGPASSWORD; failures are raised as DumpError with a message derived from stderr.
   */
  async exportDatabase(
    connection: ConnectionParameters,
    database: string,
    outputFile: string
  ): Promise<DumpInfo> {
    const timestamp = new Date();

    // Ensure output directory exists
    await fs.mkdir(dirname(outputFile), { recursive: true });

    this.logger.debug(`Executing ${PG_DUMP} for database: ${database}`);

    let result;
    try {
      result = await this.runner.run(PG_DUMP, this.buildArgs(connection, database, outputFile), {
        env: this.buildEnv(connection),
      });
    } catch (error) {
      throw new DumpError(this.analyzeSpawnError(toError(error)), undefined, toError(error));
    }

    if (result.exitCode !== 0) {
      throw new DumpError(
        this.analyzeDumpError(database, result.exitCode, result.stderr, result.stdout),
        result.exitCode
      );
    }

    // Log warnings but don't fail the dump
    if (result.stderr.includes('WARNING')) {
      this.logger.warn(`${PG_DUMP} warning: ${result.stderr.trim()}`);
    }

    // Verify the dump file was created and get stats
    let stats;
    try {
      stats = await fs.stat(outputFile);
    } catch (error) {
      throw new DumpError(
        `Dump file was not created at ${outputFile}: ${formatError(error)}`,
        undefined,
        toError(error)
      );
    }

    this.logger.debug(`Database dump created: ${stats.size} bytes`);

    return {
      filePath: outputFile,
      fileSize: stats.size,
      databaseName: database,
      timestamp,
    };
  }

  /**
   * The password never appears here: it travels in PGPASSWORD
   */
  buildArgs(connection: ConnectionParameters, database: string, outputFile: string): string[] {
    return [
      '-h',
      connection.host,
      '-p',
      String(connection.port),
      '-U',
      connection.user,
      '-d',
      database,
      '--no-password',
      '-f',
      outputFile,
    ];
  }

  buildEnv(connection: ConnectionParameters): Record<string, string> {
    return connection.password ? { PGPASSWORD: connection.password } : {};
  }

  /**
   * Analyze pg_dump error and provide helpful error messages
   */
  private analyzeDumpError(database: string, exitCode: number, stderr: string, stdout: string): string {
    const lowerStderr = stderr.toLowerCase();

    if (lowerStderr.includes('password authentication failed') || lowerStderr.includes('authentication failed')) {
      return `${PG_DUMP} authentication failed (exit code ${exitCode}). Please check database credentials.`;
    }

    if (lowerStderr.includes('database') && lowerStderr.includes('does not exist')) {
      return `${PG_DUMP} failed: database "${database}" does not exist (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('permission denied')) {
      return `${PG_DUMP} failed: insufficient permissions to access database (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('connection') && (lowerStderr.includes('refused') || lowerStderr.includes('timeout'))) {
      return `${PG_DUMP} failed: unable to connect to database server (exit code ${exitCode}).`;
    }

    if (lowerStderr.includes('no space left on device')) {
      return `${PG_DUMP} failed: insufficient disk space (exit code ${exitCode}).`;
    }

    const details = stderr.trim() || stdout.trim() || 'No additional error information available';
    return `${PG_DUMP} failed with exit code ${exitCode}. Error details: ${details}`;
  }

  /**
   * Analyze pg_dump spawn errors
   */
  private analyzeSpawnError(error: Error): string {
    const message = error.message.toLowerCase();

    if (message.includes('enoent')) {
      return `${PG_DUMP} not found. Please install PostgreSQL client tools.`;
    }

    if (message.includes('eacces')) {
      return `Permission denied executing ${PG_DUMP}.`;
    }

    return `Failed to execute ${PG_DUMP}: ${error.message}`;
  }
}
