import { Prompter } from '../interfaces/Prompter';
import { ConfigurationError } from '../errors';

/**
 * Prompter for unattended runs: every question takes its default, and a question without one is an error
 */
export class NonInteractivePrompter implements Prompter {
  async ask(question: string, defaultValue?: string): Promise<string> {
    if (defaultValue === undefined) {
      throw new ConfigurationError(`Cannot ask "${question}" in non-interactive mode`);
    }
    return defaultValue;
  }

  async askSecret(question: string, defaultValue?: string): Promise<string> {
    return this.ask(question, defaultValue);
  }

  async choose<T extends string>(question: string, _choices: readonly T[], defaultValue?: T): Promise<T> {
    if (defaultValue === undefined) {
      throw new ConfigurationError(`Cannot ask "${question}" in non-interactive mode`);
    }
    return defaultValue;
  }

  async confirm(_question: string, defaultValue = false): Promise<boolean> {
    return defaultValue;
  }

  /** Nothing is shown in unattended runs; the log carries what matters */
  print(_message: string): void {}

  close(): void {}
}
