import { BackupConfig } from './BackupConfig';

/**
 * The archive produced by one run
 */
export interface BackupArtifact {
  databaseName: string;

  /** Absolute path of the outer archive */
  filePath: string;

  /** `<database>_<YYYYMMDD_HHMMSS>.zip` */
  fileName: string;

  outputDirectory: string;

  createdAt: Date;

  /** Size of the outer archive in bytes */
  fileSize: number;

  /** Whether `filestore.zip` was bundled */
  includesFilestore: boolean;
}

/**
 * Result of a backup operation
 */
export interface BackupResult {
  artifact: BackupArtifact;

  /** Duration of the backup operation in milliseconds */
  duration: number;
}

export interface AssembleRequest {
  dumpFile: string;
  filestoreArchive: string | null;
  outputDirectory: string;
  databaseName: string;
  now?: Date;
}

export interface FilestoreArchiver {
  /** Zip a filestore directory; resolves null when the directory does not exist */
  archive(sourceDir: string, targetFile: string): Promise<string | null>;
}

export interface BackupAssembler {
  assemble(request: AssembleRequest): Promise<BackupArtifact>;
}

/**
 * Interface for the main backup orchestration manager
 */
export interface BackupManager {
  /** Execute a complete backup operation; rejects on any fatal error */
  executeBackup(config: BackupConfig): Promise<BackupResult>;
}
