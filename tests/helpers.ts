import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { CommandOptions, CommandResult, CommandRunner } from '../src/interfaces/CommandRunner';
import { Logger } from '../src/interfaces/Logger';
import { PostgreSQLClient } from '../src/interfaces/PostgreSQLClient';
import { Prompter } from '../src/interfaces/Prompter';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logBackupStart: jest.fn(),
    logBackupComplete: jest.fn(),
    logBackupError: jest.fn(),
    logConfigurationStart: jest.fn(),
    logFilestoreDetected: jest.fn(),
    logScheduleUpdate: jest.fn(),
  };
}

export function createMockPostgresClient(): jest.Mocked<PostgreSQLClient> {
  return {
    listDatabases: jest.fn().mockResolvedValue([]),
    readConfigParameters: jest.fn().mockResolvedValue(new Map<string, string>()),
    findAttachmentReference: jest.fn().mockResolvedValue(null),
  };
}

/**
 * Prompter answering from a script; an empty script answer means "accept the default"
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly printed: string[] = [];
  closed = false;

  constructor(private readonly answers: Array<string | boolean> = []) {}

  private next(question: string): string | boolean | undefined {
    this.questions.push(question);
    return this.answers.shift();
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const answer = this.next(question);
    if (typeof answer === 'string' && answer !== '') {
      return answer;
    }
    return defaultValue ?? '';
  }

  async askSecret(question: string, defaultValue?: string): Promise<string> {
    return this.ask(question, defaultValue);
  }

  async choose<T extends string>(question: string, choices: readonly T[], defaultValue?: T): Promise<T> {
    const answer = this.next(question);
    const match = choices.find(choice => choice === answer) ?? defaultValue;
    if (match === undefined) {
      throw new Error(`No scripted answer for "${question}"`);
    }
    return match;
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const answer = this.next(question);
    return typeof answer === 'boolean' ? answer : defaultValue;
  }

  print(message: string): void {
    this.printed.push(message);
  }

  close(): void {
    this.closed = true;
  }
}

export interface RecordedCommand {
  command: string;
  args: string[];
  options?: CommandOptions;
}

type Handler = (args: string[], options?: CommandOptions) => Promise<CommandResult> | CommandResult;

/**
 * CommandRunner answering from per-command handlers; unknown commands fail like a missing executable
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly handlers = new Map<string, Handler>();

  on(command: string, handler: Handler): this {
    this.handlers.set(command, handler);
    return this;
  }

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.calls.push({ command, args, options });
    const handler = this.handlers.get(command);
    if (!handler) {
      const error = new Error(`spawn ${command} ENOENT`);
      throw Object.assign(error, { code: 'ENOENT' });
    }
    return handler(args, options);
  }
}

export function ok(stdout = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '' };
}

export async function makeTempDir(prefix = 'odoo-backup-test-'): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Create files (with parents) below `root`; keys are POSIX relative paths
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const fullPath = join(root, ...relative.split('/'));
    await fs.mkdir(dirname(fullPath), { recursive: true });
    await fs.writeFile(fullPath, content);
  }
}
