import { createSession } from "./naming.js";
import type { Session } from "./types.js";

// "  -Users-alice-code-app (       7 sessions)"
const SESSION_LINE_RE = /^\s*(\S+)\s+\(\s*(\d+)\s+sessions?\)\s*$/;
// Cheap filter separating session lines from headers and totals
const SESSION_LINE_HINT = /sessions?\)/;

export type ParsedSessionLine =
  | { ok: true; name: string; count: number }
  | { ok: false; reason: "InvalidFormat"; line: string };

export function parseSessionLine(line: string): ParsedSessionLine {
  const match = SESSION_LINE_RE.exec(line);
  if (!match) return { ok: false, reason: "InvalidFormat", line };

  const name = match[1].trim();
  const count = Number.parseInt(match[2], 10);
  if (name.length === 0 || !Number.isSafeInteger(count) || count < 0) {
    return { ok: false, reason: "InvalidFormat", line };
  }

  return { ok: true, name, count };
}

export interface ParsedListOutput {
  sessions: Session[];
  /** Session-looking lines that failed to parse, or repeated a name. */
  dropped: number;
}

/** Turn `cm list` output into sessions, skipping anything that is not a session line. */
export function parseListOutput(
  output: string,
  options: { sessionDir: string; homePrefix: string },
): ParsedListOutput {
  const sessions: Session[] = [];
  const seen = new Set<string>();
  let dropped = 0;

  for (const line of output.split("\n")) {
    if (!SESSION_LINE_HINT.test(line)) continue;

    const parsed = parseSessionLine(line);
    if (!parsed.ok || seen.has(parsed.name)) {
      dropped++;
      continue;
    }

    seen.add(parsed.name);
    sessions.push(createSession(parsed.name, parsed.count, options));
  }

  return { sessions, dropped };
}
