import { ExitTimeoutError, LaunchError, errorMessage } from "../errors.js";
import type { Clock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import type { ExitStatus, ProcessHandle, ProcessManager } from "../interfaces/process-manager.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { CommandDescriptor } from "./command-descriptor.js";
import { buildSpawnEnv, formatCommand } from "./command-descriptor.js";

export type ProcessRole = "subsystem" | "main";

export interface LaunchOptions {
  role: ProcessRole;
  descriptor: CommandDescriptor;
  processManager: ProcessManager;
  clock: Clock;
  logger?: Logger;
  baseEnv?: Readonly<Record<string, string | undefined>>;
  cwd?: string;
}

const EXIT_TIMEOUT = Symbol("exit-timeout");

/**
 * A supervisor-owned OS process for one role.
 *
 * Wraps a raw ProcessHandle with the lifecycle the supervisor needs:
 * graceful stop (SIGINT), bounded wait, forced kill, and a non-blocking
 * exit check. The exit status is captured as soon as the process exits,
 * whether or not anyone is waiting for it.
 */
export class ManagedProcess {
  readonly role: ProcessRole;
  readonly pid: number;
  private readonly handle: ProcessHandle;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private status: ExitStatus | undefined;

  private constructor(role: ProcessRole, handle: ProcessHandle, clock: Clock, logger: Logger) {
    this.role = role;
    this.pid = handle.pid;
    this.handle = handle;
    this.clock = clock;
    this.logger = logger;

    void handle.exited.then((status) => {
      this.status = status;
      this.logger.info(`${role} process exited`, {
        component: "process",
        pid: this.pid,
        code: status.code,
        signal: status.signal ?? undefined,
      });
    });
  }

  /** Spawn `descriptor`. Returns as soon as the OS reports a pid. */
  static launch(options: LaunchOptions): ManagedProcess {
    const logger = options.logger ?? noopLogger;
    const { role, descriptor } = options;

    logger.info(`Starting ${role} process`, {
      component: "process",
      command: formatCommand(descriptor),
    });

    let handle: ProcessHandle;
    try {
      handle = options.processManager.spawn({
        command: descriptor.command,
        args: [...descriptor.args],
        cwd: options.cwd,
        env: buildSpawnEnv(options.baseEnv ?? {}, descriptor),
      });
    } catch (err) {
      logger.error(`Failed to start ${role} process`, { component: "process", error: err });
      throw new LaunchError(`Failed to start ${role} process: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    logger.info(`${role} process started`, { component: "process", pid: handle.pid });
    return new ManagedProcess(role, handle, options.clock, logger);
  }

  /** Ask the process to shut down (SIGINT). */
  signalStop(): void {
    if (this.status) return;
    this.logger.info(`Sending SIGINT to ${this.role} process`, { component: "process", pid: this.pid });
    this.handle.kill("SIGINT");
  }

  /** Wait up to `timeoutMs` for the process to exit. Throws ExitTimeoutError. */
  async awaitExit(timeoutMs: number): Promise<ExitStatus> {
    if (this.status) return this.status;

    const timer = new AbortController();
    try {
      const result = await Promise.race([
        this.handle.exited,
        this.clock.sleep(timeoutMs, timer.signal).then((): typeof EXIT_TIMEOUT => EXIT_TIMEOUT),
      ]);
      if (result === EXIT_TIMEOUT) {
        throw new ExitTimeoutError(
          `${this.role} process (PID ${this.pid}) did not exit within ${timeoutMs}ms`,
          timeoutMs,
        );
      }
      return result;
    } finally {
      timer.abort();
    }
  }

  /** Unconditional termination (SIGKILL). */
  forceKill(): void {
    if (this.status) return;
    this.logger.warn(`Force-killing ${this.role} process`, { component: "process", pid: this.pid });
    this.handle.kill("SIGKILL");
  }

  /** Settles once the process has exited, with its final status. */
  get exited(): Promise<ExitStatus> {
    return this.handle.exited;
  }

  pollExited(): boolean {
    return this.status !== undefined;
  }

  get exitStatus(): ExitStatus | undefined {
    return this.status;
  }

  /**
   * Graceful stop with escalation: SIGINT, wait `graceMs`, then SIGKILL and
   * wait once more. Never throws; returns undefined if the process could not
   * be confirmed dead.
   */
  async terminate(graceMs: number): Promise<ExitStatus | undefined> {
    if (this.status) return this.status;

    this.signalStop();
    try {
      const status = await this.awaitExit(graceMs);
      this.logger.info(`${this.role} process terminated`, { component: "process", pid: this.pid });
      return status;
    } catch (err) {
      this.logger.warn(`Error terminating ${this.role} process, forcing kill`, {
        component: "process",
        pid: this.pid,
        error: err,
      });
    }

    this.forceKill();
    try {
      return await this.awaitExit(graceMs);
    } catch (err) {
      this.logger.error(`${this.role} process did not exit after SIGKILL`, {
        component: "process",
        pid: this.pid,
        error: err,
      });
      return undefined;
    }
  }
}
