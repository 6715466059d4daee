import type { Logger } from "../logger.js";
import type { ManagerConfig } from "../config.js";
import type { CommandRunner } from "../cm/types.js";
import { SessionLoadError, errorMessage } from "../errors.js";
import { mapWithLimit } from "./limiter.js";
import { readSessionMetadata } from "./metadata.js";
import { parseListOutput } from "./parser.js";
import { searchSessions } from "./search.js";
import type { LoadState, SearchResult, Session } from "./types.js";

export interface LoadOptions {
  signal?: AbortSignal;
}

/**
 * Snapshot of the sessions cm knows about. Every load rebuilds the whole
 * snapshot; a failed load leaves the previous one in place.
 */
export class SessionRegistry {
  private sessions: readonly Session[] = [];
  private byName = new Map<string, Session>();
  private state: LoadState = "idle";
  private log: Logger;
  private runner: CommandRunner;
  private sessionDir: string;
  private homePrefix: string;
  private maxConcurrent: number;

  constructor(runner: CommandRunner, config: ManagerConfig, log: Logger) {
    this.log = log.child({ module: "registry" });
    this.runner = runner;
    this.sessionDir = config.claude.sessionDir;
    this.homePrefix = config.claude.homePrefix;
    this.maxConcurrent = config.load.maxConcurrentSessions;
  }

  getSessions(): readonly Session[] {
    return this.sessions;
  }

  getSession(name: string): Session | undefined {
    return this.byName.get(name);
  }

  getState(): LoadState {
    return this.state;
  }

  search(query: string): SearchResult[] {
    return searchSessions(this.sessions, query);
  }

  async load(options: LoadOptions = {}): Promise<readonly Session[]> {
    const { signal } = options;

    this.state = "listing";
    let output: string;
    try {
      output = await this.runner.run(["list"], { signal });
    } catch (err) {
      this.state = "failed";
      throw new SessionLoadError(`Failed to list sessions: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    this.state = "parsing";
    const { sessions, dropped } = parseListOutput(output, {
      sessionDir: this.sessionDir,
      homePrefix: this.homePrefix,
    });
    if (dropped > 0) {
      this.log.debug({ dropped }, "Skipped unparseable session lines");
    }

    this.state = "enriching";
    const enriched = await mapWithLimit(sessions, this.maxConcurrent, (session) =>
      this.enrich(session),
    );

    if (signal?.aborted) {
      this.state = "failed";
      throw new SessionLoadError("Session load cancelled", { cause: signal.reason });
    }

    this.sessions = enriched;
    this.byName = new Map(enriched.map((s) => [s.name, s]));
    this.state = "ready";

    this.log.info({ sessionCount: enriched.length }, "Sessions loaded");
    return enriched;
  }

  /** Same cycle as load(); the previous snapshot is discarded, not diffed. */
  refresh(options: LoadOptions = {}): Promise<readonly Session[]> {
    return this.load(options);
  }

  private async enrich(session: Session): Promise<Session> {
    try {
      const metadata = await readSessionMetadata(session.path, this.log);
      return { ...session, metadata };
    } catch (err) {
      // Still list it without metadata
      this.log.warn({ err, session: session.name }, "Failed to enrich session");
      return session;
    }
  }
}
