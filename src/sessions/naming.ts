import { join } from "node:path";
import type { Session } from "./types.js";

const AURA_MARKER = "auras";

/**
 * Human-readable form of an encoded session name:
 * `-Users-alice-code-app` with prefix `-Users-alice-` becomes `~/code/app`.
 */
export function displayName(name: string, homePrefix: string): string {
  const withHome = homePrefix ? name.replaceAll(homePrefix, "~/") : name;
  return withHome.replace(/-/g, "/");
}

export function isAuraSession(session: Pick<Session, "name">): boolean {
  return session.name.toLowerCase().includes(AURA_MARKER);
}

export function createSession(
  name: string,
  sessionCount: number,
  options: { sessionDir: string; homePrefix: string },
): Session {
  return {
    name,
    path: join(options.sessionDir, name),
    displayName: displayName(name, options.homePrefix),
    sessionCount,
  };
}
