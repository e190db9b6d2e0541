#!/usr/bin/env node
import { CliOptions, parseCliOptions } from './cli';
import { BackupAssembler } from './clients/BackupAssembler';
import { BackupManager } from './clients/BackupManager';
import { FilestoreArchiver } from './clients/FilestoreArchiver';
import { Logger } from './clients/Logger';
import { NonInteractivePrompter } from './clients/NonInteractivePrompter';
import { PgDumpExporter } from './clients/PgDumpExporter';
import { PostgreSQLClient } from './clients/PostgreSQLClient';
import { ProcessRunner } from './clients/ProcessRunner';
import { ScheduleInstaller } from './clients/ScheduleInstaller';
import { TerminalPrompter } from './clients/TerminalPrompter';
import { ConfigurationManager } from './config/ConfigurationManager';
import { BackupManager as IBackupManager } from './interfaces/BackupManager';
import { FilestoreLocator as IFilestoreLocator } from './interfaces/FilestoreLocator';
import { Logger as ILogger } from './interfaces/Logger';
import { PostgreSQLClient as IPostgreSQLClient } from './interfaces/PostgreSQLClient';
import { Prompter } from './interfaces/Prompter';
import { ScheduleInstaller as IScheduleInstaller } from './interfaces/ScheduleInstaller';
import { FilestoreLocator } from './locator/FilestoreLocator';
import { toError } from './errors';
import { buildReplayCommand, resolveCommandPrefix } from './utils/ReplayCommand';

export interface ApplicationComponents {
  logger: ILogger;
  prompter: Prompter;
  postgresClient: IPostgreSQLClient;
  locator: IFilestoreLocator;
  backupManager: IBackupManager;
  scheduleInstaller: IScheduleInstaller;
  env: Record<string, string | undefined>;
}

export type ComponentFactory = (options: CliOptions) => ApplicationComponents;

/**
 * Wire the real implementations for one run
 */
export function createComponents(options: CliOptions): ApplicationComponents {
  const env = process.env;
  const logger = Logger.create(options.logLevel ?? env.LOG_LEVEL);
  const prompter: Prompter = options.nonInteractive ? new NonInteractivePrompter() : new TerminalPrompter();
  const runner = new ProcessRunner();
  const postgresClient = new PostgreSQLClient(logger);

  return {
    logger,
    prompter,
    postgresClient,
    locator: new FilestoreLocator(postgresClient, logger),
    backupManager: new BackupManager(
      new PgDumpExporter(runner, logger),
      new FilestoreArchiver(logger),
      new BackupAssembler(logger),
      logger
    ),
    scheduleInstaller: new ScheduleInstaller(runner, prompter, logger, resolveCommandPrefix(env)),
    env,
  };
}

/**
 * Main application class: resolves the configuration, runs the backup, optionally schedules it
 */
export class OdooBackupApplication {
  constructor(private readonly factory: ComponentFactory = createComponents) {}

  /**
   * Run one backup; resolves the process exit code
   */
  async run(argv: string[]): Promise<number> {
    const options = parseCliOptions(argv);
    const components = this.factory(options);
    const { logger, prompter } = components;

    try {
      return await this.execute(options, components);
    } catch (error) {
      logger.error('Backup failed', toError(error));
      return 1;
    } finally {
      prompter.close();
    }
  }

  private async execute(options: CliOptions, components: ApplicationComponents): Promise<number> {
    const { logger, prompter, backupManager, scheduleInstaller } = components;
    const interactive = !options.nonInteractive;

    logger.info('Odoo Backup Tool');

    const configurationManager = new ConfigurationManager({
      prompter,
      postgresClient: components.postgresClient,
      locator: components.locator,
      logger,
      env: components.env,
    });
    const config = await configurationManager.resolve(options);

    logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));
    logger.info(`Database: ${config.database}`);
    logger.info(`Filestore: ${config.filestorePath ?? '(none)'}`);
    logger.info(`Output: ${config.outputPath}`);

    if (interactive && !(await prompter.confirm('Proceed with backup?', true))) {
      logger.warn('Backup cancelled');
      return 0;
    }

    const { artifact } = await backupManager.executeBackup(config);
    logger.info(`Backup saved to: ${artifact.filePath}`);
    logger.info(`Backup size: ${(artifact.fileSize / (1024 * 1024)).toFixed(2)} MB`);

    let setupCron = config.setupCron;
    if (!setupCron && interactive) {
      setupCron = await prompter.confirm('Would you like to set up automatic backups with cron?', false);
    }

    if (setupCron) {
      try {
        await scheduleInstaller.configure(buildReplayCommand(config), {
          schedule: options.cronSchedule,
          interactive,
        });
      } catch (error) {
        // The backup itself already succeeded
        logger.error('Cron setup failed', toError(error));
      }
    }

    return 0;
  }
}

/**
 * Main application entry point
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const app = new OdooBackupApplication();
  return app.run(argv);
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
