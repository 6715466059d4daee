import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { encodeHomePrefix, loadConfig } from "./config.js";

describe("loadConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "cm-tui-config-"));
    configPath = join(dir, "config.yaml");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when there is no file and no environment", () => {
    expect(loadConfig({ env: {}, configPath, home: "/Users/test" })).toEqual({
      claude: {
        sessionDir: "/Users/test/.claude/projects",
        homePrefix: "-Users-test-",
      },
      cm: { command: "cm", timeoutSeconds: 30 },
      load: { maxConcurrentSessions: 10 },
      logLevel: "warn",
    });
  });

  it("merges the yaml file over the defaults", async () => {
    await writeFile(
      configPath,
      [
        "claude:",
        "  sessionDir: /data/projects",
        "cm:",
        "  command: claude-manager",
        "  timeoutSeconds: 5",
        "load:",
        "  maxConcurrentSessions: 4",
        "logLevel: debug",
      ].join("\n"),
    );

    const config = loadConfig({ env: {}, configPath, home: "/Users/test" });

    expect(config.claude).toEqual({ sessionDir: "/data/projects", homePrefix: "-Users-test-" });
    expect(config.cm).toEqual({ command: "claude-manager", timeoutSeconds: 5 });
    expect(config.load.maxConcurrentSessions).toBe(4);
    expect(config.logLevel).toBe("debug");
  });

  it("ignores mistyped yaml values", async () => {
    await writeFile(configPath, "cm:\n  timeoutSeconds: soon\nload:\n  maxConcurrentSessions: -1\n");

    const config = loadConfig({ env: {}, configPath, home: "/Users/test" });

    expect(config.cm.timeoutSeconds).toBe(30);
    expect(config.load.maxConcurrentSessions).toBe(10);
  });

  it("lets the environment win over the file", async () => {
    await writeFile(configPath, "cm:\n  command: from-file\n");

    const config = loadConfig({
      env: {
        CLAUDE_DIR: "/env/projects",
        CLAUDE_MANAGER_BIN: "from-env",
        CLAUDE_MAX_SESSIONS: "3",
        CLAUDE_SESSION_TIMEOUT: "2.5",
        LOG_LEVEL: "info",
      },
      configPath,
      home: "/Users/test",
    });

    expect(config.claude.sessionDir).toBe("/env/projects");
    expect(config.cm).toEqual({ command: "from-env", timeoutSeconds: 2.5 });
    expect(config.load.maxConcurrentSessions).toBe(3);
    expect(config.logLevel).toBe("info");
  });

  it("prefers CM_COMMAND over CLAUDE_MANAGER_BIN", () => {
    const config = loadConfig({
      env: { CM_COMMAND: "cm-dev", CLAUDE_MANAGER_BIN: "other" },
      configPath,
    });

    expect(config.cm.command).toBe("cm-dev");
  });

  it.each([
    [{ CLAUDE_MAX_SESSIONS: "many" }, "CLAUDE_MAX_SESSIONS must be a positive integer, got: many"],
    [{ CLAUDE_MAX_SESSIONS: "0" }, "CLAUDE_MAX_SESSIONS must be a positive integer, got: 0"],
    [
      { CLAUDE_SESSION_TIMEOUT: "-1" },
      "CLAUDE_SESSION_TIMEOUT must be a positive number of seconds, got: -1",
    ],
  ])("rejects invalid numbers in %j", (env, message) => {
    expect(() => loadConfig({ env, configPath })).toThrow(message);
  });

  it("reports a malformed yaml file", async () => {
    await writeFile(configPath, "cm: [unclosed\n");

    expect(() => loadConfig({ env: {}, configPath })).toThrow(
      `Failed to parse config at ${configPath}`,
    );
  });
});

describe("encodeHomePrefix", () => {
  it("encodes the home directory the way cm names sessions", () => {
    expect(encodeHomePrefix("/Users/alice")).toBe("-Users-alice-");
    expect(encodeHomePrefix("/home/bob/")).toBe("-home-bob-");
  });
});
