import { once } from "node:events";
import { createReadStream } from "node:fs";
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { createInterface } from "node:readline";
import type { Logger } from "../logger.js";
import { emptyMetadata, type SessionMetadata } from "./types.js";

const CWD_MARKER = '"cwd":';

// Date or date-time, optional fraction and offset: 2024-05-01, 2024-05-01T10:30:00.000Z,
// 2024-05-01 10:30:00+02:00
const ISO_TIMESTAMP =
  /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

interface JsonlMetadataLine {
  cwd?: unknown;
  timestamp?: unknown;
  message_count?: unknown;
}

/**
 * Read working directory, timestamp and message count from the first
 * `.jsonl` file in a session directory. Never rejects: anything unreadable
 * yields empty metadata.
 *
 * When several `.jsonl` files exist the first one in directory-listing order
 * is used, which is not guaranteed to be the newest.
 */
export async function readSessionMetadata(
  sessionDir: string,
  log?: Logger,
): Promise<SessionMetadata> {
  try {
    const files = await listJsonlFiles(sessionDir);
    if (files.length === 0) return emptyMetadata();

    return await readFirstCwdLine(files[0]);
  } catch (err) {
    log?.debug({ err, sessionDir }, "Failed to read session metadata");
    return emptyMetadata();
  }
}

export function metadataFromJson(data: JsonlMetadataLine): SessionMetadata {
  const metadata = emptyMetadata();

  if (typeof data.cwd === "string" && data.cwd.length > 0) {
    metadata.workingDirectory = data.cwd;
  }

  if (typeof data.timestamp === "string" && ISO_TIMESTAMP.test(data.timestamp)) {
    const parsed = new Date(data.timestamp);
    if (!Number.isNaN(parsed.getTime())) metadata.lastModified = parsed;
  }

  if (typeof data.message_count === "number" && Number.isInteger(data.message_count)) {
    metadata.totalMessages = data.message_count;
  }

  return metadata;
}

async function listJsonlFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir);
  return entries.filter((e) => e.endsWith(".jsonl")).map((e) => join(dir, e));
}

async function readFirstCwdLine(filePath: string): Promise<SessionMetadata> {
  const stream = createReadStream(filePath, { encoding: "utf-8" });
  const lines = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      if (!line.includes(CWD_MARKER)) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        // Skip malformed lines
        continue;
      }

      if (isJsonObject(parsed) && "cwd" in parsed) {
        return metadataFromJson(parsed);
      }
    }
  } finally {
    lines.close();
    // Closing readline only pauses the stream; the descriptor stays open until destroyed
    if (!stream.closed) {
      const closed = once(stream, "close");
      stream.destroy();
      await closed;
    }
  }

  return emptyMetadata();
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
