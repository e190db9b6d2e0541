import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { BackupConfig } from '../interfaces/BackupConfig';
import {
  BackupAssembler,
  BackupManager as IBackupManager,
  BackupResult,
  FilestoreArchiver,
} from '../interfaces/BackupManager';
import { DatabaseExporter } from '../interfaces/DatabaseExporter';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../errors';
import { FILESTORE_ENTRY } from './BackupAssembler';

/**
 * BackupManager implementation that orchestrates one backup run:
 * database dump, filestore archive, final bundle
 */
export class BackupManager implements IBackupManager {
  constructor(
    private readonly exporter: DatabaseExporter,
    private readonly archiver: FilestoreArchiver,
    private readonly assembler: BackupAssembler,
    private readonly logger: Logger
  ) {}

  /**
   * Execute a complete backup operation.
   * Dumps the database, archives the filestore, bundles both and always removes the working directory.
   */
  async executeBackup(config: BackupConfig): Promise<BackupResult> {
    const startTime = Date.now();
    const operationId = uuidv4();
    const tempDir = await fs.mkdtemp(join(tmpdir(), 'odoo-backup-'));

    this.logger.logBackupStart(config.database, {
      operationId,
      filestorePath: config.filestorePath,
      outputPath: config.outputPath,
    });

    try {
      // Step 1: Dump the database
      const dumpFile = join(tempDir, `${config.database}.sql`);
      this.logger.info('Backing up database...');
      try {
        await this.exporter.exportDatabase(config.connection, config.database, dumpFile);
      } catch (error) {
        this.logger.logBackupError('database_dump', toError(error), { operationId });
        throw error;
      }

      // Step 2: Archive the filestore; a missing directory leaves it out
      let filestoreArchive: string | null = null;
      if (config.filestorePath) {
        this.logger.info('Backing up filestore...');
        filestoreArchive = await this.archiver.archive(config.filestorePath, join(tempDir, FILESTORE_ENTRY));
      }

      // Step 3: Bundle the dump and the filestore archive
      this.logger.info('Creating final backup...');
      const artifact = await this.assembler.assemble({
        dumpFile,
        filestoreArchive,
        outputDirectory: config.outputPath,
        databaseName: config.database,
      });

      const duration = Date.now() - startTime;
      this.logger.logBackupComplete(artifact.filePath, artifact.fileSize, duration);

      return { artifact, duration };
    } finally {
      await this.cleanupTempDir(tempDir, operationId);
    }
  }

  /**
   * Remove the working directory; failure only warns, the backup is already written
   */
  private async cleanupTempDir(tempDir: string, operationId: string): Promise<void> {
    try {
      await fs.rm(tempDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`[${operationId}] Failed to remove temporary directory ${tempDir}`, {
        error: formatError(error),
      });
    }
  }
}
