import * as cron from 'node-cron';
import { CommandRunner } from '../interfaces/CommandRunner';
import { Logger } from '../interfaces/Logger';
import { Prompter } from '../interfaces/Prompter';
import {
  SCHEDULE_RESOLUTIONS,
  ScheduleInstaller as IScheduleInstaller,
  ScheduleInstallResult,
  ScheduleResolution,
  ScheduleSetupOptions,
} from '../interfaces/ScheduleInstaller';
import { ScheduleValidationError, formatError } from '../errors';
import { composeCronLine, findMarkedLines, reconcileCrontab } from '../utils/Crontab';

export const CRONTAB = 'crontab';
export const DEFAULT_SCHEDULE = '0 2 * * *';
const CRONTAB_FIELDS = 5;

export const COMMON_SCHEDULES: ReadonlyArray<[string, string]> = [
  ['0 2 * * *', 'Daily at 2:00 AM'],
  ['0 3 * * 0', 'Weekly on Sunday at 3:00 AM'],
  ['0 1 1 * *', 'Monthly on 1st at 1:00 AM'],
  ['0 */6 * * *', 'Every 6 hours'],
];

/**
 * Installs the replay command into the user's crontab through `crontab -l` / `crontab -`
 */
export class ScheduleInstaller implements IScheduleInstaller {
  constructor(
    private readonly runner: CommandRunner,
    private readonly prompter: Prompter,
    private readonly logger: Logger,
    /** Text identifying lines this tool installed */
    private readonly marker: string
  ) {}

  /**
   * Validate a crontab schedule: exactly five fields, each accepted by node-cron.
   * node-cron also takes a leading seconds field, which crontab would read as part of the command.
   */
  validateCronExpression(expression: string): boolean {
    const fields = expression.trim().split(/\s+/);
    if (fields.length !== CRONTAB_FIELDS) {
      return false;
    }
    return cron.validate(fields.join(' '));
  }

  /**
   * Install `<schedule> <command>` into the user's crontab.
   * When lines of this tool already exist and no resolution is given, the user chooses replace, add or cancel.
   * A failed write is reported in the result, never thrown.
   */
  async install(
    schedule: string,
    command: string,
    resolution?: ScheduleResolution
  ): Promise<ScheduleInstallResult> {
    if (!this.validateCronExpression(schedule)) {
      throw new ScheduleValidationError(`Invalid cron expression: ${schedule}`, schedule);
    }

    const line = composeCronLine(schedule, command);
    const current = await this.readCrontab();

    let chosen = resolution;
    const existing = findMarkedLines(current, this.marker);
    if (existing.length > 0 && chosen === undefined) {
      this.logger.warn(`Found ${existing.length} existing backup cron job(s)`);
      this.prompter.print('Existing backup cron jobs:');
      existing.forEach((entry, index) => this.prompter.print(`  ${index + 1}. ${entry.trim()}`));
      chosen = await this.prompter.choose('Choose action', SCHEDULE_RESOLUTIONS, 'replace');
    }

    const reconciliation = reconcileCrontab(current, line, this.marker, chosen);

    if (reconciliation.table === null) {
      if (reconciliation.status === 'unchanged') {
        this.logger.warn('This exact cron job already exists in your crontab');
      } else {
        this.logger.warn('Cron setup cancelled');
      }
      return { status: reconciliation.status, line };
    }

    const written = await this.writeCrontab(reconciliation.table);
    if (written !== null) {
      this.logger.error(`Failed to update crontab: ${written}`);
      return { status: 'failed', line, error: written };
    }

    this.logger.logScheduleUpdate(reconciliation.status, line);
    return { status: reconciliation.status, line };
  }

  /**
   * Set up the schedule for `command`: ask for the expression and the go-ahead when interactive,
   * replace existing lines without asking otherwise.
   * Prints manual instructions whenever the crontab is not updated.
   */
  async configure(command: string, options: ScheduleSetupOptions): Promise<ScheduleInstallResult | null> {
    let schedule = options.schedule;

    if (schedule === undefined && options.interactive) {
      this.prompter.print('Common schedules:');
      for (const [expression, description] of COMMON_SCHEDULES) {
        this.prompter.print(`  ${expression.padEnd(12)} - ${description}`);
      }
      schedule = await this.prompter.ask('Enter cron schedule', DEFAULT_SCHEDULE);
      while (!this.validateCronExpression(schedule)) {
        this.logger.warn(`Invalid cron expression: ${schedule}`);
        schedule = await this.prompter.ask('Enter cron schedule', DEFAULT_SCHEDULE);
      }
    }

    const expression = schedule ?? DEFAULT_SCHEDULE;
    const line = composeCronLine(expression, command);
    this.logger.info(`Cron job to be added: ${line}`);

    if (options.interactive && !(await this.prompter.confirm('Add this cron job to your crontab automatically?', true))) {
      this.printManualInstructions(line);
      return null;
    }

    const result = await this.install(expression, command, options.interactive ? undefined : 'replace');
    if (result.status === 'failed' || result.status === 'cancelled') {
      this.printManualInstructions(line);
    } else {
      this.logger.info('Automated backup configured. Verify with: crontab -l');
    }
    return result;
  }

  /**
   * Current table; a missing crontab or binary reads as empty
   */
  private async readCrontab(): Promise<string> {
    try {
      const result = await this.runner.run(CRONTAB, ['-l']);
      return result.exitCode === 0 ? result.stdout : '';
    } catch (error) {
      this.logger.debug('Could not read crontab', { error: formatError(error) });
      return '';
    }
  }

  /**
   * Replace the whole table; resolves the failure reason, or null on success
   */
  private async writeCrontab(table: string): Promise<string | null> {
    try {
      const result = await this.runner.run(CRONTAB, ['-'], { input: table });
      if (result.exitCode === 0) {
        return null;
      }
      return result.stderr.trim() || `${CRONTAB} exited with code ${result.exitCode}`;
    } catch (error) {
      if (error instanceof Error && error.message.includes('ENOENT')) {
        return `${CRONTAB} command not found. Please install cron or add the job manually.`;
      }
      return formatError(error);
    }
  }

  private printManualInstructions(line: string): void {
    this.logger.info('Manual setup:');
    this.logger.info(`  1. Run: ${CRONTAB} -e`);
    this.logger.info(`  2. Add the line: ${line}`);
    this.logger.info('  3. Save and exit');
  }
}
