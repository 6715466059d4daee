import { CommandError, SessionLoadError, SessionMigrationError, errorMessage } from "../errors.js";
import { isValidWorkingDirectory } from "../sessions/migrate.js";
import { currentWorkingDirectory, type Session } from "../sessions/types.js";
import { printSearchResults, sessionsTable } from "../ui/views.js";
import type { Choice } from "../ui/prompts.js";
import { rethrowIfInterrupted, type CommandContext } from "./context.js";

export type MenuAction = "migrate" | "search" | "refresh" | "quit";

const MENU_CHOICES: ReadonlyArray<Choice<MenuAction>> = [
  { name: "Migrate a session", value: "migrate" },
  { name: "Search sessions", value: "search" },
  { name: "Refresh session list", value: "refresh" },
  { name: "Exit", value: "quit" },
];

/**
 * Table + menu loop. Errors from a single action are reported and the loop
 * returns to the menu; only an interrupt (UserInterruptError) escapes.
 */
export async function runInteractive(ctx: CommandContext): Promise<number> {
  const log = ctx.log.child({ module: "menu" });

  ctx.output.info("Loading sessions...");
  await guarded(ctx, () => ctx.registry.load({ signal: ctx.signal }), "Failed to load sessions");

  for (;;) {
    ctx.output.clear();
    ctx.output.banner("Claude Manager TUI", "Visual session management for Claude");
    ctx.output.table(sessionsTable(ctx.registry.getSessions()));

    const action = await ctx.prompter.select("What would you like to do?", MENU_CHOICES);
    log.debug({ action }, "Menu action selected");

    switch (action) {
      case "quit":
        return 0;
      case "migrate":
        await guarded(ctx, () => chooseAndMigrate(ctx), "Migration failed");
        break;
      case "search":
        await searchPrompt(ctx);
        break;
      case "refresh":
        ctx.output.info("Refreshing sessions...");
        await guarded(
          ctx,
          () => ctx.registry.refresh({ signal: ctx.signal }),
          "Failed to refresh sessions",
        );
        break;
    }
  }
}

async function pause(ctx: CommandContext): Promise<void> {
  await ctx.prompter.input("Press Enter to continue...");
}

/** Run one menu action, reporting the failures a command can produce. */
async function guarded(
  ctx: CommandContext,
  action: () => Promise<unknown>,
  label: string,
): Promise<void> {
  try {
    await action();
  } catch (err) {
    rethrowIfInterrupted(ctx.signal, err);
    if (
      !(err instanceof SessionLoadError) &&
      !(err instanceof SessionMigrationError) &&
      !(err instanceof CommandError)
    ) {
      throw err;
    }
    ctx.output.error(`${label}: ${errorMessage(err)}`);
    await pause(ctx);
  }
}

async function chooseAndMigrate(ctx: CommandContext): Promise<void> {
  const sessions = ctx.registry.getSessions();
  if (sessions.length === 0) {
    ctx.output.warn("No sessions to migrate");
    await pause(ctx);
    return;
  }

  const name = await ctx.prompter.select("Choose a session to migrate:", [
    ...sessions.map((s) => ({ name: s.displayName, value: s.name })),
    { name: "Cancel", value: "" },
  ]);
  const session = ctx.registry.getSession(name);
  if (!session) return;

  await migratePrompt(ctx, session);
}

async function migratePrompt(ctx: CommandContext, session: Session): Promise<void> {
  const current = currentWorkingDirectory(session);
  ctx.output.info(`Migrating session: ${session.displayName}`);
  ctx.output.line(`Current path: ${current || "N/A"}`);

  const answer = (
    await ctx.prompter.input("Enter new path (or press Enter to cancel):", current)
  ).trim();
  if (answer === "" || answer === current) {
    ctx.output.warn("Migration cancelled");
    await pause(ctx);
    return;
  }

  if (!(await isValidWorkingDirectory(answer))) {
    ctx.output.error(`Invalid path '${answer}'`);
    await pause(ctx);
    return;
  }

  const confirmed = await ctx.prompter.confirm(
    `Migrate from ${current || "N/A"} to ${answer}?`,
    false,
  );
  if (!confirmed) {
    ctx.output.warn("Migration cancelled");
    await pause(ctx);
    return;
  }

  ctx.output.info("Migrating session...");
  const outcome = await ctx.migrator.migrate(session, answer, { signal: ctx.signal });

  if (outcome.output.trim()) ctx.output.line(outcome.output.trimEnd());
  ctx.output.success("✓ Migration complete!");
  if (outcome.reloadError) {
    rethrowIfInterrupted(ctx.signal, outcome.reloadError);
    ctx.output.error(`Failed to reload sessions: ${outcome.reloadError.message}`);
  }
  await pause(ctx);
}

async function searchPrompt(ctx: CommandContext): Promise<void> {
  const query = await ctx.prompter.input("Search query:");
  if (query.trim() === "") return;

  printSearchResults(ctx.output, query, ctx.registry.search(query));
  await pause(ctx);
}
