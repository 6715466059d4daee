export type CommandErrorKind = "ExecutionFailed" | "Timeout" | "Cancelled";

/** A cm invocation that did not complete successfully. */
export class CommandError extends Error {
  code: string;
  kind: CommandErrorKind;

  constructor(kind: CommandErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.code = kind === "Timeout" ? "COMMAND_TIMEOUT" : kind === "Cancelled" ? "COMMAND_CANCELLED" : "COMMAND_FAILED";
    this.name = "CommandError";
  }
}

export class SessionLoadError extends Error {
  code = "LOAD_FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionLoadError";
  }
}

export class SessionMigrationError extends Error {
  code = "MIGRATION_FAILED";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SessionMigrationError";
  }
}

/** Ctrl+C in a prompt, or SIGINT while a command was running. */
export class UserInterruptError extends Error {
  code = "USER_INTERRUPT";

  constructor(options?: ErrorOptions) {
    super("Interrupted by user", options);
    this.name = "UserInterruptError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
