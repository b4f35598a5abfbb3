export type StopSignal = "SIGINT" | "SIGTERM" | "SIGKILL";

/** How a process ended. `code` is null when it was killed by a signal. */
export interface ExitStatus {
  code: number | null;
  signal: string | null;
}

/** A handle to a spawned OS process whose stdio is inherited from the supervisor. */
export interface ProcessHandle {
  readonly pid: number;
  /** Resolves once, when the process exits. Never rejects. */
  readonly exited: Promise<ExitStatus>;
  /** Deliver a signal. Returns false if the signal could not be delivered. */
  kill(signal?: StopSignal): boolean;
}

export interface SpawnOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string | undefined>;
}

export interface ProcessManager {
  /** Spawn a process. Throws if the OS refused to create it. */
  spawn(options: SpawnOptions): ProcessHandle;
}
