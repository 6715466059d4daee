export interface SessionMetadata {
  workingDirectory?: string;
  lastModified?: Date;
  totalMessages: number;
}

export interface Session {
  readonly name: string;
  /** Session directory under the configured session root. */
  readonly path: string;
  readonly displayName: string;
  readonly sessionCount: number;
  readonly metadata?: SessionMetadata;
}

export interface SearchResult {
  session: Session;
  score: number;
  matches: string[];
}

export type LoadState =
  | "idle"
  | "listing"
  | "parsing"
  | "enriching"
  | "ready"
  | "failed";

export function emptyMetadata(): SessionMetadata {
  return { totalMessages: 0 };
}

export function currentWorkingDirectory(session: Session): string {
  return session.metadata?.workingDirectory ?? "";
}
