export interface RunOptions {
  signal?: AbortSignal;
}

/**
 * Runs the external session manager. Both calls resolve with stdout and
 * fail with a CommandError.
 */
export interface CommandRunner {
  run(args: readonly string[], options?: RunOptions): Promise<string>;
  runSync(args: readonly string[]): string;
}
