import { confirm, input, select } from "@inquirer/prompts";
import { UserInterruptError } from "../errors.js";

export interface Choice<T> {
  name: string;
  value: T;
}

export interface Prompter {
  select<T>(message: string, choices: ReadonlyArray<Choice<T>>): Promise<T>;
  /** Resolves with `defaultValue` when the answer is left empty. */
  input(message: string, defaultValue?: string): Promise<string>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
}

const FALLBACK_TERM_HEIGHT = 24;

/** Fill the terminal, leaving room for the prompt chrome. */
const termPageSize = (reserved = 4): number =>
  Math.max(5, (process.stdout.rows ?? FALLBACK_TERM_HEIGHT) - reserved);

export class InquirerPrompter implements Prompter {
  select<T>(message: string, choices: ReadonlyArray<Choice<T>>): Promise<T> {
    return interruptible(() =>
      select({
        message,
        choices: choices.map((c) => ({ name: c.name, value: c.value })),
        pageSize: termPageSize(),
      }),
    );
  }

  input(message: string, defaultValue?: string): Promise<string> {
    return interruptible(() => input({ message, default: defaultValue }));
  }

  confirm(message: string, defaultValue = false): Promise<boolean> {
    return interruptible(() => confirm({ message, default: defaultValue }));
  }
}

// inquirer rejects with ExitPromptError on Ctrl+C
async function interruptible<T>(prompt: () => Promise<T>): Promise<T> {
  try {
    return await prompt();
  } catch (err) {
    if (err instanceof Error && err.name === "ExitPromptError") {
      throw new UserInterruptError({ cause: err });
    }
    throw err;
  }
}
