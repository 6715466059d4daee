import { currentWorkingDirectory, type SearchResult, type Session } from "./types.js";

const NAME_WEIGHT = 3;
const DISPLAY_WEIGHT = 2;
const PATH_WEIGHT = 1;

export function tokenize(query: string): string[] {
  return query.toLowerCase().split(/\s+/).filter((t) => t.length > 0);
}

/**
 * Rank sessions by keyword hits. Each token is checked against the raw name,
 * the display name and the working directory, and scores once per field it
 * appears in. Sessions without any hit are left out; ties keep input order.
 */
export function searchSessions(
  sessions: readonly Session[],
  query: string,
): SearchResult[] {
  const tokens = tokenize(query);
  if (tokens.length === 0) return [];

  const results: SearchResult[] = [];

  for (const session of sessions) {
    const name = session.name.toLowerCase();
    const display = session.displayName.toLowerCase();
    const path = currentWorkingDirectory(session).toLowerCase();

    let score = 0;
    const matches: string[] = [];

    for (const token of tokens) {
      if (name.includes(token)) {
        score += NAME_WEIGHT;
        matches.push(`name: ${token}`);
      }
      if (display.includes(token)) {
        score += DISPLAY_WEIGHT;
        matches.push(`display: ${token}`);
      }
      if (path.includes(token)) {
        score += PATH_WEIGHT;
        matches.push(`path: ${token}`);
      }
    }

    if (score > 0) results.push({ session, score, matches });
  }

  return results.sort((a, b) => b.score - a.score);
}
