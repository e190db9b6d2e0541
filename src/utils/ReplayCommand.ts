import { BackupConfig } from '../interfaces/BackupConfig';

export const DEFAULT_COMMAND_PREFIX = 'npx odoo-backup';

/**
 * The replay prefix; it doubles as the marker of this tool's crontab lines
 */
export function resolveCommandPrefix(env: Record<string, string | undefined>): string {
  return env.ODOO_BACKUP_COMMAND?.trim() || DEFAULT_COMMAND_PREFIX;
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value for a POSIX shell; safe values pass through unchanged
 */
export function shellQuote(value: string): string {
  if (SHELL_SAFE.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Command line that repeats this backup without any prompt
 */
export function buildReplayCommand(config: BackupConfig): string {
  const parts = [
    config.commandPrefix,
    '--host',
    shellQuote(config.connection.host),
    '--port',
    String(config.connection.port),
    '--user',
    shellQuote(config.connection.user),
    '--database',
    shellQuote(config.database),
  ];

  if (config.filestorePath) {
    parts.push('--filestore-path', shellQuote(config.filestorePath));
  }

  parts.push('--output-path', shellQuote(config.outputPath), '--non-interactive');

  if (config.connection.password) {
    parts.push('--password', shellQuote(config.connection.password));
  }

  return parts.join(' ');
}
