import { BackupConfig, ConnectionParameters } from '../interfaces/BackupConfig';
import { FilestoreLocator } from '../interfaces/FilestoreLocator';
import { Logger } from '../interfaces/Logger';
import { PostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { Prompter } from '../interfaces/Prompter';
import { CliOptions } from '../cli';
import { ConfigurationError } from '../errors';
import { resolveCommandPrefix } from '../utils/ReplayCommand';

export const DEFAULTS = {
  host: 'localhost',
  port: 5432,
  user: 'odoo',
  password: '',
  outputPath: './backups',
} as const;

export function defaultFilestorePath(database: string): string {
  return `/opt/odoo/data/filestore/${database}`;
}

export interface ConfigurationDependencies {
  prompter: Prompter;
  postgresClient: PostgreSQLClient;
  locator: FilestoreLocator;
  logger: Logger;
  env?: Record<string, string | undefined>;
}

/**
 * Resolves every backup setting from flags, then the environment, then a prompt or the default
 */
export class ConfigurationManager {
  private readonly env: Record<string, string | undefined>;

  constructor(private readonly deps: ConfigurationDependencies) {
    this.env = deps.env ?? process.env;
  }

  async resolve(options: CliOptions): Promise<BackupConfig> {
    const interactive = !options.nonInteractive;

    const connection = await this.resolveConnection(options, interactive);
    const database = await this.resolveDatabase(options, connection, interactive);
    const filestorePath = await this.resolveFilestorePath(options, connection, database, interactive);
    const outputPath = await this.resolveOutputPath(options, interactive);

    const config: BackupConfig = {
      connection,
      database,
      filestorePath,
      outputPath,
      setupCron: options.setupCron,
      nonInteractive: options.nonInteractive,
      commandPrefix: resolveCommandPrefix(this.env),
    };

    const logLevel = options.logLevel ?? this.env.LOG_LEVEL;
    if (logLevel) {
      config.logLevel = logLevel;
    }

    return config;
  }

  /**
   * Port from PGPORT, else the built-in default.
   * Only called when no `--port` flag was given, so an unused PGPORT is never validated.
   */
  environmentPort(): number {
    const rawPort = this.env.PGPORT;
    if (!rawPort) {
      return DEFAULTS.port;
    }

    const port = Number(rawPort);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigurationError('PGPORT must be an integer between 1 and 65535', 'PGPORT');
    }
    return port;
  }

  /**
   * Flag, then libpq environment variable, then prompt (interactive) or built-in default
   */
  private async resolveConnection(options: CliOptions, interactive: boolean): Promise<ConnectionParameters> {
    const { prompter } = this.deps;
    const defaultHost = this.env.PGHOST || DEFAULTS.host;
    const defaultUser = this.env.PGUSER || DEFAULTS.user;
    const defaultPassword = this.env.PGPASSWORD ?? DEFAULTS.password;

    if (!interactive) {
      return {
        host: options.host || defaultHost,
        port: options.port ?? this.environmentPort(),
        user: options.user || defaultUser,
        password: options.password ?? defaultPassword,
      };
    }

    const host = options.host || (await prompter.ask('PostgreSQL host', defaultHost));
    const port = options.port ?? (await this.askPort(this.environmentPort()));
    const user = options.user || (await prompter.ask('PostgreSQL user', defaultUser));
    const password = options.password ?? (await prompter.askSecret('PostgreSQL password', defaultPassword));

    return { host, port, user, password };
  }

  private async askPort(defaultPort: number): Promise<number> {
    for (;;) {
      const answer = await this.deps.prompter.ask('PostgreSQL port', String(defaultPort));
      const port = Number(answer);
      if (Number.isInteger(port) && port >= 1 && port <= 65535) {
        return port;
      }
      this.deps.logger.warn(`Invalid port: ${answer}`);
    }
  }

  private async resolveDatabase(
    options: CliOptions,
    connection: ConnectionParameters,
    interactive: boolean
  ): Promise<string> {
    if (options.database) {
      return options.database;
    }

    if (!interactive) {
      throw new ConfigurationError('Database must be specified in non-interactive mode', 'database');
    }

    const { postgresClient, prompter } = this.deps;
    const databases = await postgresClient.listDatabases(connection);
    if (databases.length === 0) {
      throw new ConfigurationError('No databases found', 'database');
    }

    prompter.print('Available databases:');
    databases.forEach((name, index) => prompter.print(`  ${index + 1}. ${name}`));

    const choices = databases.map((_, index) => String(index + 1));
    const choice = await prompter.choose('Select database index', choices);
    return databases[Number(choice) - 1];
  }

  private async resolveFilestorePath(
    options: CliOptions,
    connection: ConnectionParameters,
    database: string,
    interactive: boolean
  ): Promise<string | null> {
    if (options.filestorePath) {
      return options.filestorePath;
    }

    const { locator, logger, prompter } = this.deps;
    logger.info(`Auto-detecting filestore for database '${database}'...`);
    const detected = await locator.locate(database, connection);
    if (detected) {
      return detected;
    }

    const fallback = defaultFilestorePath(database);
    if (interactive) {
      logger.warn('Please specify the filestore path manually');
      return (await prompter.ask('Filestore path', fallback)) || null;
    }

    logger.warn(`Using default filestore path: ${fallback}`);
    return fallback;
  }

  private async resolveOutputPath(options: CliOptions, interactive: boolean): Promise<string> {
    const fallback = this.env.ODOO_BACKUP_OUTPUT_PATH || DEFAULTS.outputPath;
    if (options.outputPath) {
      return options.outputPath;
    }
    if (!interactive) {
      return fallback;
    }
    return this.deps.prompter.ask('Output directory', fallback);
  }

  /**
   * Configuration safe to print: the password is redacted
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    return {
      ...config,
      connection: {
        ...config.connection,
        password: config.connection.password ? '[REDACTED]' : '',
      },
    };
  }
}
