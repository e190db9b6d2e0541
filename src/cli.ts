import { Command, InvalidArgumentError } from 'commander';

export interface CliOptions {
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  filestorePath?: string;
  outputPath?: string;
  setupCron: boolean;
  nonInteractive: boolean;
  cronSchedule?: string;
  logLevel?: string;
}

export const VERSION = '1.0.0';

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

export function createProgram(): Command {
  return new Command()
    .name('odoo-backup')
    .description('Back up an Odoo database and its filestore into a single zip archive')
    .version(VERSION)
    .option('--host <host>', 'PostgreSQL host')
    .option('--port <port>', 'PostgreSQL port', parsePort)
    .option('--user <user>', 'PostgreSQL user')
    .option('--password <password>', 'PostgreSQL password')
    .option('--database <name>', 'Database name')
    .option('--filestore-path <path>', 'Odoo filestore path')
    .option('--output-path <path>', 'Output directory for backups')
    .option('--setup-cron', 'Setup cron job for automated backups', false)
    .option('--cron-schedule <expression>', 'Cron schedule used with --setup-cron')
    .option('--non-interactive', 'Run in non-interactive mode', false)
    .option('--log-level <level>', 'Log level (error, warn, info, debug)');
}

/**
 * Parse process-style argv (node, script, ...args)
 */
export function parseCliOptions(argv: string[], program: Command = createProgram()): CliOptions {
  program.parse(argv);
  return program.opts<CliOptions>();
}
