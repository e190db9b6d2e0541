export type ScheduleResolution = 'replace' | 'add' | 'cancel';

export const SCHEDULE_RESOLUTIONS: readonly ScheduleResolution[] = ['replace', 'add', 'cancel'];

export type ScheduleStatus = 'installed' | 'replaced' | 'added' | 'unchanged' | 'cancelled' | 'failed';

export interface ScheduleInstallResult {
  status: ScheduleStatus;

  /** The composed `<schedule> <command>` line */
  line: string;

  /** Failure reason when status is 'failed' */
  error?: string;
}

export interface ScheduleSetupOptions {
  /** Schedule to use without asking */
  schedule?: string;
  interactive: boolean;
}

/**
 * Installs recurring backup entries into the user's crontab
 */
export interface ScheduleInstaller {
  /** Validate a cron expression */
  validateCronExpression(expression: string): boolean;

  /**
   * Reconcile `<schedule> <command>` into the crontab.
   * Without a resolution the user is asked when entries of this tool already exist.
   */
  install(schedule: string, command: string, resolution?: ScheduleResolution): Promise<ScheduleInstallResult>;

  /**
   * Ask for the schedule and install it; null when the user keeps to manual setup
   */
  configure(command: string, options: ScheduleSetupOptions): Promise<ScheduleInstallResult | null>;
}
