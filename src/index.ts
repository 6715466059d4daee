#!/usr/bin/env node
/**
 * cm-tui: list, search and migrate Claude session directories managed by cm.
 *
 * Usage:
 *   cm-tui                   Interactive table and menu
 *   cm-tui list              Print the sessions table
 *   cm-tui search <query>    Print sessions matching the query
 *   cm-tui help              Show this help
 */

import chalk from "chalk";
import { CONFIG_PATH, loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { UserInterruptError, errorMessage } from "./errors.js";
import { CmCommandRunner } from "./cm/runner.js";
import { SessionRegistry } from "./sessions/registry.js";
import { SessionMigrator } from "./sessions/migrate.js";
import { TerminalOutput } from "./ui/output.js";
import { InquirerPrompter } from "./ui/prompts.js";
import type { CommandContext } from "./commands/context.js";
import { runInteractive } from "./commands/interactive.js";
import { runList } from "./commands/list.js";
import { runSearch } from "./commands/search.js";

const USAGE = `Usage:
  cm-tui                   Interactive table and menu
  cm-tui list              Print the sessions table
  cm-tui search <query>    Print sessions matching the query
  cm-tui help              Show this help

Configuration: ${CONFIG_PATH} (optional), overridden by
  CLAUDE_DIR, CM_COMMAND, CLAUDE_MAX_SESSIONS, CLAUDE_SESSION_TIMEOUT, LOG_LEVEL`;

async function main(): Promise<number> {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  // SIGINT aborts the running cm command instead of killing the process
  const controller = new AbortController();
  process.on("SIGINT", () => {
    log.info({ signal: "SIGINT" }, "Interrupt received");
    controller.abort();
  });

  const runner = new CmCommandRunner(config.cm, log);
  const registry = new SessionRegistry(runner, config, log);
  const ctx: CommandContext = {
    registry,
    migrator: new SessionMigrator(runner, registry, log),
    output: new TerminalOutput(process.stdout),
    prompter: new InquirerPrompter(),
    log,
    signal: controller.signal,
  };

  const [command, ...rest] = process.argv.slice(2);

  switch (command) {
    case undefined:
      return runInteractive(ctx);

    case "list":
      return runList(ctx);

    case "search":
      return runSearch(ctx, rest);

    case "help":
    case "--help":
    case "-h":
      ctx.output.line(USAGE);
      return 0;

    default:
      ctx.output.error(`Unknown command: ${command}`);
      ctx.output.line('Run "cm-tui help" for usage');
      return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof UserInterruptError) {
      process.stdout.write(`\n${chalk.yellow("Goodbye!")}\n`);
      process.exit(0);
    }
    console.error(chalk.red(`Fatal error: ${errorMessage(err)}`));
    process.exit(1);
  });
