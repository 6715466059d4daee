import { stat } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import type { Logger } from "../logger.js";
import type { CommandRunner } from "../cm/types.js";
import { SessionLoadError, SessionMigrationError, errorMessage } from "../errors.js";
import type { SessionRegistry } from "./registry.js";
import { currentWorkingDirectory, type Session } from "./types.js";

export interface MigrationOutcome {
  /** stdout of `cm migrate`. */
  output: string;
  /** Set when the migration succeeded but the follow-up reload did not. */
  reloadError?: SessionLoadError;
}

export function expandHome(path: string, home = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/** Empty means "no working directory recorded" and is accepted as is. */
export async function isValidWorkingDirectory(path: string): Promise<boolean> {
  if (path === "") return true;
  try {
    return (await stat(expandHome(path))).isDirectory();
  } catch {
    return false;
  }
}

export class SessionMigrator {
  private log: Logger;
  private runner: CommandRunner;
  private registry: SessionRegistry;

  constructor(runner: CommandRunner, registry: SessionRegistry, log: Logger) {
    this.log = log.child({ module: "migrate" });
    this.runner = runner;
    this.registry = registry;
  }

  /**
   * Ask cm to move a session's recorded working directory, then reload the
   * registry so it reflects the new state.
   */
  async migrate(
    session: Session,
    newWorkingDirectory: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<MigrationOutcome> {
    if (!(await isValidWorkingDirectory(newWorkingDirectory))) {
      throw new SessionMigrationError(`Invalid new path: ${newWorkingDirectory}`);
    }

    const target = newWorkingDirectory === "" ? "" : expandHome(newWorkingDirectory);
    const from = currentWorkingDirectory(session);

    let output: string;
    try {
      output = await this.runner.run(["migrate", from, target, session.path], {
        signal: options.signal,
      });
    } catch (err) {
      throw new SessionMigrationError(`Migration command failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.log.info({ session: session.name, from, to: target }, "Session migrated");

    try {
      await this.registry.refresh({ signal: options.signal });
    } catch (err) {
      if (!(err instanceof SessionLoadError)) throw err;
      this.log.warn({ err }, "Reload after migration failed");
      return { output, reloadError: err };
    }

    return { output };
  }
}
