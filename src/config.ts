import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";

export interface ManagerConfig {
  claude: {
    /** Directory holding one subdirectory per session name. */
    sessionDir: string;
    /** Encoded home directory, shown as `~/` in display names. */
    homePrefix: string;
  };
  cm: {
    command: string;
    timeoutSeconds: number;
  };
  load: {
    maxConcurrentSessions: number;
  };
  logLevel: string;
}

const CONFIG_DIR = join(homedir(), ".config", "claude-session-manager");
const CONFIG_PATH = join(CONFIG_DIR, "config.yaml");

/** `/Users/alice` becomes `-Users-alice-`, matching how cm names session directories. */
export function encodeHomePrefix(home: string): string {
  return `${home.replace(/\/+$/, "").replace(/\//g, "-")}-`;
}

export function defaults(home = homedir()): ManagerConfig {
  return {
    claude: {
      sessionDir: join(home, ".claude", "projects"),
      homePrefix: encodeHomePrefix(home),
    },
    cm: {
      command: "cm",
      timeoutSeconds: 30,
    },
    load: {
      maxConcurrentSessions: 10,
    },
    logLevel: "warn",
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  home?: string;
}

/**
 * Resolve configuration: built-in defaults, then the optional YAML file,
 * then environment variables.
 */
export function loadConfig(options: LoadConfigOptions = {}): ManagerConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env.CM_TUI_CONFIG ?? CONFIG_PATH;
  let config = defaults(options.home);

  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(configPath, "utf-8"));
    } catch (err) {
      throw new Error(`Failed to parse config at ${configPath}: ${err}`);
    }
    if (isRecord(parsed)) {
      config = mergeConfig(config, parsed);
    }
  }

  return applyEnv(config, env);
}

function mergeConfig(
  base: ManagerConfig,
  overrides: Record<string, unknown>,
): ManagerConfig {
  const result: ManagerConfig = {
    claude: { ...base.claude },
    cm: { ...base.cm },
    load: { ...base.load },
    logLevel: base.logLevel,
  };

  if (typeof overrides.logLevel === "string") result.logLevel = overrides.logLevel;

  const claude = overrides.claude;
  if (isRecord(claude)) {
    if (typeof claude.sessionDir === "string")
      result.claude.sessionDir = claude.sessionDir;
    if (typeof claude.homePrefix === "string")
      result.claude.homePrefix = claude.homePrefix;
  }

  const cm = overrides.cm;
  if (isRecord(cm)) {
    if (typeof cm.command === "string") result.cm.command = cm.command;
    if (typeof cm.timeoutSeconds === "number" && cm.timeoutSeconds > 0)
      result.cm.timeoutSeconds = cm.timeoutSeconds;
  }

  const load = overrides.load;
  if (isRecord(load)) {
    if (
      typeof load.maxConcurrentSessions === "number" &&
      Number.isInteger(load.maxConcurrentSessions) &&
      load.maxConcurrentSessions > 0
    )
      result.load.maxConcurrentSessions = load.maxConcurrentSessions;
  }

  return result;
}

function applyEnv(config: ManagerConfig, env: NodeJS.ProcessEnv): ManagerConfig {
  const result: ManagerConfig = {
    claude: { ...config.claude },
    cm: { ...config.cm },
    load: { ...config.load },
    logLevel: config.logLevel,
  };

  if (env.CLAUDE_DIR) result.claude.sessionDir = env.CLAUDE_DIR;

  const command = env.CM_COMMAND || env.CLAUDE_MANAGER_BIN;
  if (command) result.cm.command = command;

  if (env.CLAUDE_MAX_SESSIONS) {
    const value = Number(env.CLAUDE_MAX_SESSIONS);
    if (!Number.isInteger(value) || value <= 0) {
      throw new Error(
        `CLAUDE_MAX_SESSIONS must be a positive integer, got: ${env.CLAUDE_MAX_SESSIONS}`,
      );
    }
    result.load.maxConcurrentSessions = value;
  }

  if (env.CLAUDE_SESSION_TIMEOUT) {
    const value = Number(env.CLAUDE_SESSION_TIMEOUT);
    if (!Number.isFinite(value) || value <= 0) {
      throw new Error(
        `CLAUDE_SESSION_TIMEOUT must be a positive number of seconds, got: ${env.CLAUDE_SESSION_TIMEOUT}`,
      );
    }
    result.cm.timeoutSeconds = value;
  }

  if (env.LOG_LEVEL) result.logLevel = env.LOG_LEVEL;

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export { CONFIG_PATH };
