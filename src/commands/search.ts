import { printSearchResults } from "../ui/views.js";
import { loadSessions, type CommandContext } from "./context.js";

/** `cm-tui search <words...>` — print ranked matches once. */
export async function runSearch(ctx: CommandContext, words: readonly string[]): Promise<number> {
  const query = words.join(" ");
  if (query.trim() === "") {
    ctx.output.error("Usage: cm-tui search <query>");
    return 1;
  }

  if (!(await loadSessions(ctx))) return 1;

  printSearchResults(ctx.output, query, ctx.registry.search(query));
  return 0;
}
