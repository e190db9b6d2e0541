import * as readline from 'readline/promises';
import { Writable } from 'stream';
import { Prompter } from '../interfaces/Prompter';

/**
 * stdout that can stop echoing while a secret is typed
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

function withDefault(question: string, defaultValue?: string): string {
  return defaultValue !== undefined && defaultValue !== '' ? `${question} (${defaultValue}): ` : `${question}: `;
}

/**
 * Prompter on top of readline/promises
 */
export class TerminalPrompter implements Prompter {
  private readonly output: MutableOutput;
  private readonly rl: readline.Interface;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly target: NodeJS.WritableStream = process.stdout
  ) {
    this.output = new MutableOutput(target);
    this.rl = readline.createInterface({ input, output: this.output, terminal: true });
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const answer = (await this.rl.question(withDefault(question, defaultValue))).trim();
    return answer === '' ? (defaultValue ?? '') : answer;
  }

  /**
   * Read a value with echo muted; the prompt itself stays visible
   */
  async askSecret(question: string, defaultValue?: string): Promise<string> {
    this.target.write(`${question}: `);
    this.output.muted = true;
    try {
      const answer = await this.rl.question('');
      return answer === '' ? (defaultValue ?? '') : answer;
    } finally {
      this.output.muted = false;
      this.target.write('\n');
    }
  }

  /**
   * Ask until the answer is one of `choices`; an empty answer takes the default
   */
  async choose<T extends string>(question: string, choices: readonly T[], defaultValue?: T): Promise<T> {
    const label = `${question} [${choices.join('/')}]`;
    for (;;) {
      const answer = await this.ask(label, defaultValue);
      const match = choices.find(choice => choice === answer);
      if (match !== undefined) {
        return match;
      }
      this.target.write(`Please select one of: ${choices.join(', ')}\n`);
    }
  }

  /**
   * Ask a yes/no question until the answer is recognised
   */
  async confirm(question: string, defaultValue = false): Promise<boolean> {
    for (;;) {
      const answer = (await this.rl.question(`${question} [${defaultValue ? 'Y/n' : 'y/N'}]: `)).trim().toLowerCase();
      if (answer === '') {
        return defaultValue;
      }
      if (answer === 'y' || answer === 'yes') {
        return true;
      }
      if (answer === 'n' || answer === 'no') {
        return false;
      }
      this.target.write('Please enter y or n\n');
    }
  }

  print(message: string): void {
    this.target.write(`${message}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
