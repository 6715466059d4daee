import { pino } from "pino";
import { defaults, type ManagerConfig } from "./config.js";
import type { CommandRunner, RunOptions } from "./cm/types.js";
import type { OutputSink } from "./ui/output.js";
import type { Choice, Prompter } from "./ui/prompts.js";
import type { TableData } from "./ui/table.js";

export const silentLogger = pino({ level: "silent" });

export function testConfig(sessionDir: string, overrides: Partial<ManagerConfig["load"]> = {}): ManagerConfig {
  const config = defaults("/Users/test");
  return {
    ...config,
    claude: { sessionDir, homePrefix: "-Users-test-" },
    load: { ...config.load, ...overrides },
  };
}

type Handler = (args: readonly string[]) => string | Promise<string>;

/** In-process stand-in for the cm binary. */
export class StubRunner implements CommandRunner {
  calls: string[][] = [];
  private handlers = new Map<string, Handler>();

  on(subcommand: string, handler: Handler): this {
    this.handlers.set(subcommand, handler);
    return this;
  }

  async run(args: readonly string[], options: RunOptions = {}): Promise<string> {
    this.calls.push([...args]);
    options.signal?.throwIfAborted();
    const handler = this.handlers.get(args[0]);
    if (!handler) throw new Error(`Unexpected cm call: ${args.join(" ")}`);
    return handler(args);
  }

  runSync(): string {
    throw new Error("runSync is not stubbed");
  }
}

export class RecordingOutput implements OutputSink {
  lines: string[] = [];
  tables: TableData[] = [];

  clear(): void {
    this.lines.push("[clear]");
  }

  banner(title: string): void {
    this.lines.push(`[banner] ${title}`);
  }

  table(table: TableData): void {
    this.tables.push(table);
  }

  line(text = ""): void {
    this.lines.push(text);
  }

  info(message: string): void {
    this.lines.push(`[info] ${message}`);
  }

  success(message: string): void {
    this.lines.push(`[success] ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`[warn] ${message}`);
  }

  error(message: string): void {
    this.lines.push(`[error] ${message}`);
  }
}

/**
 * Answers prompts from a script. A string answers select (by choice name)
 * or input; an empty string accepts the input default. A boolean answers
 * confirm.
 */
export class ScriptedPrompter implements Prompter {
  asked: string[] = [];
  private answers: Array<string | boolean>;

  constructor(answers: Array<string | boolean>) {
    this.answers = [...answers];
  }

  async select<T>(message: string, choices: ReadonlyArray<Choice<T>>): Promise<T> {
    const answer = this.next(message);
    const choice = choices.find((c) => c.name === answer);
    if (typeof answer !== "string" || !choice) {
      throw new Error(`No choice ${String(answer)} for "${message}"`);
    }
    return choice.value;
  }

  async input(message: string, defaultValue?: string): Promise<string> {
    const answer = this.next(message);
    if (typeof answer !== "string") throw new Error(`Expected text for "${message}"`);
    return answer === "" ? (defaultValue ?? "") : answer;
  }

  async confirm(message: string): Promise<boolean> {
    const answer = this.next(message);
    if (typeof answer !== "boolean") throw new Error(`Expected yes/no for "${message}"`);
    return answer;
  }

  private next(message: string): string | boolean {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`Unscripted prompt: "${message}"`);
    return answer;
  }
}
