import pino, { type Logger } from "pino";

export type { Logger };

/**
 * Logs go to stderr so they never interleave with tables on stdout.
 */
export function createLogger(level: string): Logger {
  if (process.env.NODE_ENV !== "production") {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}
