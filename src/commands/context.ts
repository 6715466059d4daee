import type { Logger } from "../logger.js";
import type { SessionRegistry } from "../sessions/registry.js";
import type { SessionMigrator } from "../sessions/migrate.js";
import type { OutputSink } from "../ui/output.js";
import type { Prompter } from "../ui/prompts.js";
import { UserInterruptError, errorMessage } from "../errors.js";

export interface CommandContext {
  registry: SessionRegistry;
  migrator: SessionMigrator;
  output: OutputSink;
  prompter: Prompter;
  log: Logger;
  /** Fired on SIGINT. */
  signal: AbortSignal;
}

/** Failures caused by an interrupt are reported as the interrupt itself. */
export function rethrowIfInterrupted(signal: AbortSignal, err: unknown): void {
  if (err instanceof UserInterruptError) throw err;
  if (signal.aborted) throw new UserInterruptError({ cause: err });
}

/** Load sessions once; returns false after reporting a failure. */
export async function loadSessions(ctx: CommandContext): Promise<boolean> {
  try {
    await ctx.registry.load({ signal: ctx.signal });
    return true;
  } catch (err) {
    rethrowIfInterrupted(ctx.signal, err);
    ctx.output.error(`Error loading sessions: ${errorMessage(err)}`);
    return false;
  }
}
