import { ConnectionParameters } from './BackupConfig';

export interface DumpInfo {
  filePath: string;
  fileSize: number;
  databaseName: string;
  timestamp: Date;
}

export interface DatabaseExporter {
  /** Write a plain SQL dump of one database to `outputFile` */
  exportDatabase(
    connection: ConnectionParameters,
    database: string,
    outputFile: string
  ): Promise<DumpInfo>;
}
