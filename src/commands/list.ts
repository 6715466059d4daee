import { sessionsTable } from "../ui/views.js";
import { loadSessions, type CommandContext } from "./context.js";

/** `cm-tui list` — print the sessions table once. */
export async function runList(ctx: CommandContext): Promise<number> {
  if (!(await loadSessions(ctx))) return 1;

  ctx.output.table(sessionsTable(ctx.registry.getSessions()));
  return 0;
}
