import { homedir } from 'os';
import path from 'path';
import { ConnectionParameters } from '../interfaces/BackupConfig';
import {
  FilestoreLocator as IFilestoreLocator,
  FilestoreStrategy,
  HostEnvironment,
  LocatorContext,
} from '../interfaces/FilestoreLocator';
import { Logger } from '../interfaces/Logger';
import { PostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { formatError } from '../errors';
import { isAcceptedFilestore } from './DirectoryProbe';
import { DEFAULT_SEARCH_PATHS, SearchPaths } from './SearchPaths';
import { AttachmentReferenceStrategy } from './strategies/AttachmentReferenceStrategy';
import { ConfigFileStrategy } from './strategies/ConfigFileStrategy';
import { ConventionalPathStrategy } from './strategies/ConventionalPathStrategy';
import { DatabaseConfigStrategy } from './strategies/DatabaseConfigStrategy';

export interface FilestoreLocatorOptions {
  /** Replaces the default strategy chain */
  strategies?: FilestoreStrategy[];
  /** Replaces the bundled search paths used by the default chain */
  searchPaths?: SearchPaths;
  host?: HostEnvironment;
  isAccepted?: (candidate: string) => Promise<boolean>;
}

export function currentHost(): HostEnvironment {
  return {
    platform: process.platform,
    homeDir: homedir(),
    env: process.env,
  };
}

/**
 * The search order: database configuration, attachment references, config files, usual paths
 */
export function defaultStrategies(searchPaths: SearchPaths = DEFAULT_SEARCH_PATHS): FilestoreStrategy[] {
  return [
    new DatabaseConfigStrategy(),
    new AttachmentReferenceStrategy(searchPaths.attachmentBases),
    new ConfigFileStrategy(searchPaths.configFiles),
    new ConventionalPathStrategy(searchPaths.filestoreDirs),
  ];
}

/**
 * Runs the strategy chain and returns the first accepted filestore directory
 */
export class FilestoreLocator implements IFilestoreLocator {
  private readonly strategies: FilestoreStrategy[];
  private readonly host: HostEnvironment;
  private readonly isAccepted: (candidate: string) => Promise<boolean>;

  constructor(
    private readonly postgresClient: PostgreSQLClient,
    private readonly logger: Logger,
    options: FilestoreLocatorOptions = {}
  ) {
    this.strategies = options.strategies ?? defaultStrategies(options.searchPaths);
    this.host = options.host ?? currentHost();
    this.isAccepted = options.isAccepted ?? isAcceptedFilestore;
  }

  async locate(database: string, connection: ConnectionParameters): Promise<string | null> {
    const context: LocatorContext = {
      database,
      connection,
      host: this.host,
      postgresClient: this.postgresClient,
      logger: this.logger,
      isAccepted: this.isAccepted,
    };

    for (const strategy of this.strategies) {
      let found: string | null;
      try {
        found = await strategy.locate(context);
      } catch (error) {
        this.logger.debug(`Filestore strategy ${strategy.name} failed`, { error: formatError(error) });
        continue;
      }

      if (found !== null) {
        const filestorePath = path.isAbsolute(found) ? found : path.resolve(found);
        this.logger.logFilestoreDetected(database, filestorePath, strategy.name);
        return filestorePath;
      }

      this.logger.debug(`Filestore strategy ${strategy.name} found nothing for '${database}'`);
    }

    this.logger.warn(`Could not auto-detect filestore for database '${database}'`);
    return null;
  }
}
