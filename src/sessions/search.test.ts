import { describe, it, expect } from "vitest";
import { createSession } from "./naming.js";
import { searchSessions, tokenize } from "./search.js";
import type { Session } from "./types.js";

const naming = { sessionDir: "/root", homePrefix: "-Users-test-" };

function session(name: string, cwd?: string): Session {
  const base = createSession(name, 1, naming);
  return cwd === undefined ? base : { ...base, metadata: { workingDirectory: cwd, totalMessages: 0 } };
}

const sessions: Session[] = [
  session("-Users-test-web-shop", "/srv/shop"),
  session("-Users-test-api", "/Users/test/web-api"),
  session("-Users-test-notes"),
  session("-Users-test-webhooks", "/Users/test/hooks"),
];

describe("tokenize", () => {
  it("lower-cases and splits on any whitespace", () => {
    expect(tokenize("  Web\tSHOP \n")).toEqual(["web", "shop"]);
  });
});

describe("searchSessions", () => {
  it.each(["", "   ", "\t\n"])("returns nothing for %j", (query) => {
    expect(searchSessions(sessions, query)).toEqual([]);
  });

  it("adds 3 for name, 2 for display name and 1 for path hits", () => {
    const results = searchSessions(sessions, "shop");

    expect(results).toHaveLength(1);
    expect(results[0].session.name).toBe("-Users-test-web-shop");
    expect(results[0].score).toBe(6);
    expect(results[0].matches).toEqual(["name: shop", "display: shop", "path: shop"]);
  });

  it("scores each token independently and lists each session once", () => {
    const results = searchSessions(sessions, "web shop");

    expect(results.map((r) => [r.session.name, r.score])).toEqual([
      // web: 3 + 2, shop: 3 + 2 + 1
      ["-Users-test-web-shop", 11],
      // web: 3 + 2
      ["-Users-test-webhooks", 5],
      // web: path only
      ["-Users-test-api", 1],
    ]);
  });

  it("matches the display form of the name", () => {
    const results = searchSessions(sessions, "~/notes");

    expect(results).toHaveLength(1);
    expect(results[0].score).toBe(2);
    expect(results[0].matches).toEqual(["display: ~/notes"]);
  });

  it("keeps input order on equal scores and sorts descending", () => {
    const tied = [session("-x-alpha-one"), session("-x-beta-one"), session("-x-one-one-gamma")];
    const results = searchSessions(tied, "one");

    expect(results.map((r) => r.session.name)).toEqual([
      "-x-alpha-one",
      "-x-beta-one",
      "-x-one-one-gamma",
    ]);
    for (let i = 1; i < results.length; i++) {
      expect(results[i - 1].score).toBeGreaterThanOrEqual(results[i].score);
    }
  });

  it("excludes sessions without any hit", () => {
    expect(searchSessions(sessions, "nothing-here")).toEqual([]);
  });
});
