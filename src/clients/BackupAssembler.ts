import { promises as fs } from 'fs';
import path from 'path';
import { AssembleRequest, BackupArtifact, BackupAssembler as IBackupAssembler } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { ArchiveError, formatError, toError } from '../errors';
import { ZipEntry, writeZip } from '../utils/ZipWriter';

export const FILESTORE_ENTRY = 'filestore.zip';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local time as YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function backupFileName(databaseName: string, date: Date): string {
  return `${databaseName}_${formatTimestamp(date)}.zip`;
}

/**
 * Bundles the SQL dump and the filestore archive into the final backup
 */
export class BackupAssembler implements IBackupAssembler {
  constructor(private readonly logger: Logger) {}

  /**
   * Write `<database>_<YYYYMMDD_HHMMSS>.zip` into the output directory, creating it if needed.
   * Any failure is raised as an ArchiveError.
   */
  async assemble(request: AssembleRequest): Promise<BackupArtifact> {
    const createdAt = request.now ?? new Date();
    const outputDirectory = path.resolve(request.outputDirectory);
    const fileName = backupFileName(request.databaseName, createdAt);
    const filePath = path.join(outputDirectory, fileName);

    try {
      await fs.mkdir(outputDirectory, { recursive: true });

      // Step 1: The dump must exist; it is streamed, whatever its size
      const dump = await fs.stat(request.dumpFile);
      if (!dump.isFile()) {
        throw new Error(`Dump is not a regular file: ${request.dumpFile}`);
      }
      const entries: ZipEntry[] = [{ source: request.dumpFile, name: `${request.databaseName}.sql` }];

      // Step 2: The filestore archive is optional and skipped when it was never written
      let includesFilestore = false;
      if (request.filestoreArchive) {
        const filestore = await fs.stat(request.filestoreArchive).catch(() => null);
        if (filestore?.isFile()) {
          entries.push({ source: request.filestoreArchive, name: FILESTORE_ENTRY });
          includesFilestore = true;
        }
      }

      // Step 3: Write the outer archive
      await writeZip(filePath, entries);

      const stats = await fs.stat(filePath);
      this.logger.debug(`Backup archive written: ${filePath}`, { includesFilestore });

      return {
        databaseName: request.databaseName,
        filePath,
        fileName,
        outputDirectory,
        createdAt,
        fileSize: stats.size,
        includesFilestore,
      };
    } catch (error) {
      throw new ArchiveError(`Failed to create backup archive ${filePath}: ${formatError(error)}`, toError(error));
    }
  }
}
