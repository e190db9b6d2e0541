export interface ConnectionParameters {
  host: string;
  port: number;
  user: string;
  password: string;
}

export interface BackupConfig {
  connection: ConnectionParameters;
  database: string;
  /** Directory holding the database's attachments; null when there is none to back up */
  filestorePath: string | null;
  outputPath: string;
  setupCron: boolean;
  nonInteractive: boolean;
  /** Prefix of the command line replayed from crontab */
  commandPrefix: string;
  logLevel?: string;
}
