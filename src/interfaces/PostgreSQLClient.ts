import { ConnectionParameters } from './BackupConfig';

export interface PostgreSQLClient {
  /** Names of all non-template databases, read through the administrative database */
  listDatabases(connection: ConnectionParameters): Promise<string[]>;

  /** Values of the requested `ir_config_parameter` keys present in the database */
  readConfigParameters(
    connection: ConnectionParameters,
    database: string,
    keys: readonly string[]
  ): Promise<Map<string, string>>;

  /** One stored-file reference from `ir_attachment`, or null when there is none */
  findAttachmentReference(connection: ConnectionParameters, database: string): Promise<string | null>;
}
