export interface Prompter {
  /** Ask for free text; an empty answer yields the default */
  ask(question: string, defaultValue?: string): Promise<string>;

  /** Ask for a secret; input is not echoed */
  askSecret(question: string, defaultValue?: string): Promise<string>;

  /** Ask until the answer is one of the choices */
  choose<T extends string>(question: string, choices: readonly T[], defaultValue?: T): Promise<T>;

  /** Yes/no question */
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;

  /** Show a line to the user, such as a menu entry; never filtered by the log level */
  print(message: string): void;

  /** Release the terminal */
  close(): void;
}
