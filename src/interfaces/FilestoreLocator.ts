import { ConnectionParameters } from './BackupConfig';
import { Logger } from './Logger';
import { PostgreSQLClient } from './PostgreSQLClient';

/**
 * Host details the search paths depend on
 */
export interface HostEnvironment {
  platform: NodeJS.Platform;
  homeDir: string;
  env: Record<string, string | undefined>;
}

/**
 * Everything a strategy may consult while searching
 */
export interface LocatorContext {
  database: string;
  connection: ConnectionParameters;
  host: HostEnvironment;
  postgresClient: PostgreSQLClient;
  logger: Logger;

  /** True when the directory exists and has at least one entry */
  isAccepted(candidate: string): Promise<boolean>;
}

/**
 * One way of finding a filestore; strategies are tried in priority order
 */
export interface FilestoreStrategy {
  readonly name: string;
  locate(context: LocatorContext): Promise<string | null>;
}

export interface FilestoreLocator {
  locate(database: string, connection: ConnectionParameters): Promise<string | null>;
}
