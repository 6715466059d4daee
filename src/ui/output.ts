import chalk from "chalk";
import { formatTable, type CellStyle, type Painter, type TableData } from "./table.js";

/**
 * Everything the workflow prints goes through an OutputSink so the
 * interactive loop and the one-shot commands can be driven in tests.
 */
export interface OutputSink {
  clear(): void;
  banner(title: string, subtitle: string): void;
  table(table: TableData): void;
  line(text?: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const CELL_COLORS: Record<CellStyle, (text: string) => string> = {
  name: chalk.cyan,
  count: chalk.green,
  path: chalk.yellow,
  muted: chalk.dim,
};

const chalkPainter: Painter = {
  title: (text) => chalk.bold.italic(text),
  header: (text) => chalk.bold.magenta(text),
  group: (text) => chalk.bold(text),
  border: (text) => chalk.gray(text),
  cell: (style, text) => (style ? CELL_COLORS[style](text) : text),
};

export class TerminalOutput implements OutputSink {
  private stream: NodeJS.WriteStream;

  constructor(stream: NodeJS.WriteStream = process.stdout) {
    this.stream = stream;
  }

  clear(): void {
    if (this.stream.isTTY) this.stream.write("\x1B[2J\x1B[3J\x1B[H");
  }

  banner(title: string, subtitle: string): void {
    const width = Math.max(title.length, subtitle.length);
    const edge = "─".repeat(width + 2);
    this.line(chalk.cyan(`╭${edge}╮`));
    this.line(`${chalk.cyan("│")} ${chalk.bold.cyan(title.padEnd(width))} ${chalk.cyan("│")}`);
    this.line(`${chalk.cyan("│")} ${subtitle.padEnd(width)} ${chalk.cyan("│")}`);
    this.line(chalk.cyan(`╰${edge}╯`));
  }

  table(table: TableData): void {
    for (const line of formatTable(table, chalkPainter)) this.line(line);
  }

  line(text = ""): void {
    this.stream.write(`${text}\n`);
  }

  info(message: string): void {
    this.line(chalk.cyan(message));
  }

  success(message: string): void {
    this.line(chalk.green(message));
  }

  warn(message: string): void {
    this.line(chalk.yellow(message));
  }

  error(message: string): void {
    this.line(chalk.red(message));
  }
}
