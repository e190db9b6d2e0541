/**
 * Outcome of a finished subprocess
 */
export interface CommandResult {
  /** Exit code; -1 when the process was terminated by a signal */
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Extra environment variables, merged over the current process environment */
  env?: Record<string, string>;

  /** Text written to the child's stdin before it is closed */
  input?: string;
}

/**
 * Narrow subprocess capability used for pg_dump and crontab
 */
export interface CommandRunner {
  /**
   * Run a command to completion.
   * Rejects only when the executable cannot be started (e.g. ENOENT);
   * a non-zero exit resolves with the exit code.
   */
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}
