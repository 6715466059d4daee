import { describe, it, expect } from "vitest";
import { CommandError } from "../errors.js";
import { SessionMigrator } from "../sessions/migrate.js";
import { SessionRegistry } from "../sessions/registry.js";
import {
  RecordingOutput,
  ScriptedPrompter,
  StubRunner,
  silentLogger,
  testConfig,
} from "../test-helpers.js";
import type { CommandContext } from "./context.js";
import { runList } from "./list.js";
import { runSearch } from "./search.js";

const LIST = ["  -Users-test-alpha (2 sessions)", "  -Users-test-beta (1 session)"].join("\n");

function context(runner: StubRunner): { ctx: CommandContext; output: RecordingOutput } {
  const registry = new SessionRegistry(runner, testConfig("/nonexistent/projects"), silentLogger);
  const output = new RecordingOutput();
  return {
    output,
    ctx: {
      registry,
      migrator: new SessionMigrator(runner, registry, silentLogger),
      output,
      prompter: new ScriptedPrompter([]),
      log: silentLogger,
      signal: new AbortController().signal,
    },
  };
}

describe("runList", () => {
  it("prints the sessions table", async () => {
    const { ctx, output } = context(new StubRunner().on("list", () => LIST));

    await expect(runList(ctx)).resolves.toBe(0);

    expect(output.tables).toHaveLength(1);
    expect(output.tables[0].rows).toEqual([
      { kind: "group", label: "Other Sessions" },
      { kind: "data", cells: ["  ~/alpha", "2", "N/A", ""] },
      { kind: "data", cells: ["  ~/beta", "1", "N/A", ""] },
    ]);
  });

  it("reports a load failure with exit code 1", async () => {
    const runner = new StubRunner().on("list", () => {
      throw new CommandError("Timeout", "Command timed out after 30s: cm list");
    });
    const { ctx, output } = context(runner);

    await expect(runList(ctx)).resolves.toBe(1);

    expect(output.lines).toEqual([
      "[error] Error loading sessions: Failed to list sessions: Command timed out after 30s: cm list",
    ]);
    expect(output.tables).toEqual([]);
  });
});

describe("runSearch", () => {
  it("joins the words into one query", async () => {
    const { ctx, output } = context(new StubRunner().on("list", () => LIST));

    await expect(runSearch(ctx, ["ALPHA", "missing"])).resolves.toBe(0);

    expect(output.lines[0]).toBe("[success] Found 1 matches for 'ALPHA missing':");
    expect(output.lines[2]).toBe(" 1. ~/alpha (score: 5)");
  });

  it("requires a query", async () => {
    const runner = new StubRunner();
    const { ctx, output } = context(runner);

    await expect(runSearch(ctx, [])).resolves.toBe(1);

    expect(output.lines).toEqual(["[error] Usage: cm-tui search <query>"]);
    expect(runner.calls).toEqual([]);
  });
});
