export interface CommandRunnerResult {
  stdout: string;
  stderr: string;
  /** Null when the command was terminated by a signal (including a timeout kill). */
  exitCode: number | null;
  timedOut: boolean;
  durationMs: number;
}

export interface CommandRunOptions {
  timeoutMs: number;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
}

/**
 * Runs a short-lived command to completion and captures its output.
 * Rejects only when the command could not be run at all or was aborted.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options: CommandRunOptions): Promise<CommandRunnerResult>;
}
