import { describe, it, expect } from "vitest";
import { createSession } from "../sessions/naming.js";
import { searchSessions } from "../sessions/search.js";
import type { Session } from "../sessions/types.js";
import { RecordingOutput } from "../test-helpers.js";
import { formatTimestamp, printSearchResults, sessionsTable } from "./views.js";

const naming = { sessionDir: "/p", homePrefix: "-Users-test-" };

function session(name: string, count: number, cwd?: string, lastModified?: Date): Session {
  return {
    ...createSession(name, count, naming),
    metadata: { workingDirectory: cwd, lastModified, totalMessages: 0 },
  };
}

describe("formatTimestamp", () => {
  it("formats local time as YYYY-MM-DD HH:mm", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 7))).toBe("2024-01-05 09:07");
  });
});

describe("sessionsTable", () => {
  it("groups aura sessions first and sorts each group by name", () => {
    const table = sessionsTable([
      session("-Users-test-zeta", 2, "/z"),
      session("-Users-test-auras-igris", 7, undefined, new Date(2024, 2, 1, 14, 30)),
      session("-Users-test-alpha", 0),
    ]);

    expect(table.title).toBe("Claude Sessions");
    expect(table.columns.map((c) => c.header)).toEqual([
      "Name",
      "Sessions",
      "Current Path",
      "Last Modified",
    ]);
    expect(table.rows).toEqual([
      { kind: "group", label: "Aura Sessions" },
      { kind: "data", cells: ["  ~/auras/igris", "7", "N/A", "2024-03-01 14:30"] },
      { kind: "separator" },
      { kind: "group", label: "Other Sessions" },
      { kind: "data", cells: ["  ~/alpha", "0", "N/A", ""] },
      { kind: "data", cells: ["  ~/zeta", "2", "/z", ""] },
    ]);
  });

  it("omits the separator when only one group exists", () => {
    const table = sessionsTable([session("-Users-test-a", 1)]);

    expect(table.rows.map((r) => r.kind)).toEqual(["group", "data"]);
  });
});

describe("printSearchResults", () => {
  it("reports when nothing matched", () => {
    const output = new RecordingOutput();
    printSearchResults(output, "zzz", []);

    expect(output.lines).toEqual(["[warn] No matches found for 'zzz'"]);
  });

  it("prints numbered results with path, count and matches", () => {
    const output = new RecordingOutput();
    const sessions = [session("-Users-test-shop", 3, "/srv/shop")];
    printSearchResults(output, "shop", searchSessions(sessions, "shop"));

    expect(output.lines).toEqual([
      "[success] Found 1 matches for 'shop':",
      "",
      " 1. ~/shop (score: 6)",
      "    Path: /srv/shop",
      "    Sessions: 3",
      "    Matches: name: shop, display: shop, path: shop",
      "",
    ]);
  });

  it("shows at most ten results", () => {
    const output = new RecordingOutput();
    const sessions = Array.from({ length: 12 }, (_, i) => session(`-Users-test-p${i}`, 1));
    printSearchResults(output, "p", searchSessions(sessions, "p"));

    expect(output.lines[0]).toBe("[success] Found 12 matches for 'p':");
    expect(output.lines.filter((l) => /^\s?\d+\. /.test(l))).toHaveLength(10);
  });
});
