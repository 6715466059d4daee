import { isAuraSession } from "../sessions/naming.js";
import { currentWorkingDirectory, type SearchResult, type Session } from "../sessions/types.js";
import type { OutputSink } from "./output.js";
import type { TableData, TableRow } from "./table.js";

export const MAX_SEARCH_RESULTS = 10;

export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}`
  );
}

function byName(a: Session, b: Session): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function sessionRows(sessions: Session[], label: string): TableRow[] {
  if (sessions.length === 0) return [];
  return [
    { kind: "group", label },
    ...[...sessions].sort(byName).map((session): TableRow => {
      const lastModified = session.metadata?.lastModified;
      return {
        kind: "data",
        cells: [
          `  ${session.displayName}`,
          String(session.sessionCount),
          currentWorkingDirectory(session) || "N/A",
          lastModified ? formatTimestamp(lastModified) : "",
        ],
      };
    }),
  ];
}

/** Sessions grouped into aura and other sessions, each sorted by name. */
export function sessionsTable(sessions: readonly Session[]): TableData {
  const aura = sessions.filter((s) => isAuraSession(s));
  const other = sessions.filter((s) => !isAuraSession(s));

  const rows = sessionRows(aura, "Aura Sessions");
  if (aura.length > 0 && other.length > 0) rows.push({ kind: "separator" });
  rows.push(...sessionRows(other, "Other Sessions"));

  return {
    title: "Claude Sessions",
    columns: [
      { header: "Name", style: "name" },
      { header: "Sessions", align: "right", style: "count" },
      { header: "Current Path", style: "path" },
      { header: "Last Modified", style: "muted" },
    ],
    rows,
  };
}

export function printSearchResults(
  output: OutputSink,
  query: string,
  results: readonly SearchResult[],
): void {
  if (results.length === 0) {
    output.warn(`No matches found for '${query}'`);
    return;
  }

  output.success(`Found ${results.length} matches for '${query}':`);
  output.line();

  results.slice(0, MAX_SEARCH_RESULTS).forEach((result, i) => {
    const { session } = result;
    output.line(`${String(i + 1).padStart(2)}. ${session.displayName} (score: ${result.score})`);
    output.line(`    Path: ${currentWorkingDirectory(session) || "N/A"}`);
    output.line(`    Sessions: ${session.sessionCount}`);
    if (result.matches.length > 0) {
      output.line(`    Matches: ${result.matches.join(", ")}`);
    }
    output.line();
  });
}
