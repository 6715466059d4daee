import { execFile, execFileSync } from "node:child_process";
import { promisify } from "node:util";
import type { Logger } from "../logger.js";
import type { ManagerConfig } from "../config.js";
import { CommandError } from "../errors.js";
import type { CommandRunner, RunOptions } from "./types.js";

const exec = promisify(execFile);

// list output for a few hundred sessions stays far below this
const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/** Fields node attaches to child_process errors. */
interface ProcessFailure {
  message: string;
  name?: unknown;
  code?: unknown;
  status?: unknown;
  killed?: unknown;
  stderr?: unknown;
}

export class CmCommandRunner implements CommandRunner {
  private log: Logger;
  private command: string;
  private timeoutSeconds: number;

  constructor(config: ManagerConfig["cm"], log: Logger) {
    this.log = log.child({ module: "cm" });
    this.command = config.command;
    this.timeoutSeconds = config.timeoutSeconds;
  }

  async run(args: readonly string[], options: RunOptions = {}): Promise<string> {
    this.log.debug({ command: this.command, args }, "Running cm");
    try {
      const { stdout } = await exec(this.command, [...args], {
        encoding: "utf8",
        timeout: this.timeoutMs(),
        killSignal: "SIGKILL",
        maxBuffer: MAX_OUTPUT_BYTES,
        signal: options.signal,
      });
      return stdout;
    } catch (err) {
      throw this.toCommandError(err, args);
    }
  }

  /** Blocking variant, same failure semantics as run(). */
  runSync(args: readonly string[]): string {
    this.log.debug({ command: this.command, args }, "Running cm (sync)");
    try {
      return execFileSync(this.command, [...args], {
        encoding: "utf8",
        timeout: this.timeoutMs(),
        killSignal: "SIGKILL",
        maxBuffer: MAX_OUTPUT_BYTES,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (err) {
      throw this.toCommandError(err, args);
    }
  }

  private timeoutMs(): number {
    return Math.max(1, Math.round(this.timeoutSeconds * 1000));
  }

  private toCommandError(err: unknown, args: readonly string[]): CommandError {
    const failure: ProcessFailure =
      err instanceof Error ? err : { message: String(err) };
    const commandLine = [this.command, ...args].join(" ");

    if (failure.name === "AbortError") {
      this.log.debug({ commandLine }, "cm cancelled");
      return new CommandError("Cancelled", `Command cancelled: ${commandLine}`, {
        cause: err,
      });
    }

    // async timeouts set `killed`, execFileSync reports ETIMEDOUT
    if (failure.killed === true || failure.code === "ETIMEDOUT") {
      this.log.warn({ commandLine, timeoutSeconds: this.timeoutSeconds }, "cm timed out");
      return new CommandError(
        "Timeout",
        `Command timed out after ${this.timeoutSeconds}s: ${commandLine}`,
        { cause: err },
      );
    }

    const exitCode =
      typeof failure.code === "number"
        ? failure.code
        : typeof failure.status === "number"
          ? failure.status
          : undefined;

    if (exitCode !== undefined) {
      const stderr =
        typeof failure.stderr === "string" ? failure.stderr.trim() : "";
      this.log.warn({ commandLine, exitCode, stderr }, "cm exited with an error");
      return new CommandError(
        "ExecutionFailed",
        `Command failed with code ${exitCode}: ${stderr}`,
        { cause: err },
      );
    }

    this.log.warn({ commandLine, err }, "cm could not be started");
    return new CommandError(
      "ExecutionFailed",
      `Command execution failed: ${failure.message}`,
      { cause: err },
    );
  }
}
