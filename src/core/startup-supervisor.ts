/**
 * Startup Supervisor — brings a robot stack up in order.
 *
 * Launches the subsystem, polls its status channel until the target value
 * appears (restarting the subsystem when the channel goes stale), then
 * launches the main process and watches both until one exits or the run is
 * interrupted. Every run ends in ABORTED or TERMINATED and stops its
 * children exactly once.
 *
 * @module Supervisor
 */

import { SystemClock } from "../adapters/system-clock.js";
import {
  InterruptedError,
  LaunchError,
  ReadinessTimeoutError,
  RestartBudgetExhaustedError,
  SupervisorError,
  toSupervisorError,
} from "../errors.js";
import type { Clock } from "../interfaces/clock.js";
import type { HealthProbe, ProbeOutcome } from "../interfaces/health-probe.js";
import type { Logger } from "../interfaces/logger.js";
import type { ExitStatus, ProcessManager } from "../interfaces/process-manager.js";
import type { ResolvedConfig } from "../types/config.js";
import { resolveChannelName } from "../types/config.js";
import { noopLogger } from "../utils/noop-logger.js";
import type { CommandDescriptor } from "./command-descriptor.js";
import { createCommandDescriptor } from "./command-descriptor.js";
import { LivenessTracker } from "./liveness-tracker.js";
import type { ProcessRole } from "./managed-process.js";
import { ManagedProcess } from "./managed-process.js";
import { RestartPolicy } from "./restart-policy.js";
import type { SupervisorState, TerminalState } from "./supervisor-state.js";
import { isSupervisorTransitionAllowed } from "./supervisor-state.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export type SupervisorPhase =
  | "subsystem launch"
  | "readiness wait"
  | "subsystem restart"
  | "main launch"
  | "monitoring";

export interface ChildExit {
  role: ProcessRole;
  status: ExitStatus;
}

export interface SupervisorOutcome {
  exitCode: 0 | 1;
  state: TerminalState;
  /** Phase that failed, set when the run aborted. */
  phase?: SupervisorPhase;
  error?: SupervisorError;
  /** The child whose exit ended monitoring. */
  childExit?: ChildExit;
  interrupted: boolean;
  restarts: number;
}

export interface SupervisorEventMap {
  "state:changed": { from: SupervisorState; to: SupervisorState };
  "process:launched": { role: ProcessRole; pid: number };
  "process:exited": { role: ProcessRole; pid: number; status: ExitStatus };
  "probe:result": { outcome: ProbeOutcome; at: number };
  "restart:attempt": { attempt: number; maxAttempts: number };
}

export interface StartupSupervisorOptions {
  config: ResolvedConfig;
  processManager: ProcessManager;
  probe: HealthProbe;
  clock?: Clock;
  logger?: Logger;
  /** Environment the children inherit before their own overlays. */
  baseEnv?: Readonly<Record<string, string | undefined>>;
}

const COMPONENT = "supervisor";

export class StartupSupervisor extends TypedEventEmitter<SupervisorEventMap> {
  readonly channel: string;
  private readonly config: ResolvedConfig;
  private readonly processManager: ProcessManager;
  private readonly probe: HealthProbe;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly baseEnv: Readonly<Record<string, string | undefined>>;
  private readonly subsystemCommand: CommandDescriptor;
  private readonly mainCommand: CommandDescriptor;
  private readonly liveness = new LivenessTracker();
  private readonly restartPolicy: RestartPolicy;

  private currentState: SupervisorState = "INIT";
  private phase: SupervisorPhase = "subsystem launch";
  private subsystem: ManagedProcess | undefined;
  private main: ManagedProcess | undefined;
  /** Subsystems that outlived a restart's SIGKILL; stopped again at shutdown. */
  private readonly survivors: ManagedProcess[] = [];
  private started = false;
  private shutdownPromise: Promise<void> | undefined;

  constructor(options: StartupSupervisorOptions) {
    const logger = options.logger ?? noopLogger;
    super((event, error) => {
      logger.warn(`Listener for ${event} failed`, { component: COMPONENT, error });
    });
    this.config = options.config;
    this.processManager = options.processManager;
    this.probe = options.probe;
    this.clock = options.clock ?? new SystemClock();
    this.logger = logger;
    this.baseEnv = options.baseEnv ?? {};
    this.channel = resolveChannelName(options.config);
    const { subsystem, main, unbufferedEnv } = options.config;
    this.subsystemCommand = createCommandDescriptor(subsystem, unbufferedEnv);
    this.mainCommand = createCommandDescriptor(main, unbufferedEnv);
    this.restartPolicy = new RestartPolicy(options.config.maxRestartAttempts);
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get restartAttempts(): number {
    return this.restartPolicy.attemptCount;
  }

  /**
   * Execute one full startup run. `signal` is the interrupt: once it aborts,
   * every pending wait ends and the run terminates cleanly.
   */
  async run(signal: AbortSignal = new AbortController().signal): Promise<SupervisorOutcome> {
    if (this.started) {
      throw new SupervisorError("Supervisor has already been run", "ALREADY_RUN");
    }
    this.started = true;

    let outcome: SupervisorOutcome;
    try {
      try {
        const childExit = await this.execute(signal);
        this.transition("TERMINATED");
        outcome = this.outcome({ exitCode: 0, state: "TERMINATED", childExit });
      } catch (err) {
        outcome = this.settleFailure(err);
      }
    } finally {
      await this.shutdown();
    }

    this.report(outcome);
    return outcome;
  }

  private async execute(signal: AbortSignal): Promise<ChildExit> {
    this.throwIfInterrupted(signal);

    this.phase = "subsystem launch";
    this.transition("LAUNCH_SUBSYSTEM");
    await this.launchSubsystem(signal);

    this.phase = "readiness wait";
    this.transition("AWAIT_READY");
    await this.awaitReady(signal);

    this.phase = "main launch";
    this.transition("LAUNCH_MAIN");
    this.main = this.launch("main", this.mainCommand);

    this.phase = "monitoring";
    this.transition("RUNNING");
    return this.monitor(signal);
  }

  // ---------------------------------------------------------------------------
  // Launch
  // ---------------------------------------------------------------------------

  private launch(role: ProcessRole, descriptor: CommandDescriptor): ManagedProcess {
    const proc = ManagedProcess.launch({
      role,
      descriptor,
      processManager: this.processManager,
      clock: this.clock,
      logger: this.logger,
      baseEnv: this.baseEnv,
      cwd: this.config.workspaceRoot,
    });
    this.emit("process:launched", { role, pid: proc.pid });
    void proc.exited.then((status) => {
      this.emit("process:exited", { role, pid: proc.pid, status });
    });
    return proc;
  }

  private async launchSubsystem(signal: AbortSignal): Promise<void> {
    this.subsystem = this.launch("subsystem", this.subsystemCommand);
    this.logger.info(`Waiting ${this.config.settleDelayMs / 1000}s for status channel to initialize`, {
      component: COMPONENT,
    });
    await this.clock.sleep(this.config.settleDelayMs, signal);
    this.throwIfInterrupted(signal);
  }

  // ---------------------------------------------------------------------------
  // Readiness
  // ---------------------------------------------------------------------------

  private async awaitReady(signal: AbortSignal): Promise<void> {
    const { targetState, stateField, readinessTimeoutMs, stalenessThresholdMs } = this.config;
    let windowStart = this.clock.now();
    let consecutiveFailures = 0;
    this.liveness.recordReset(windowStart);

    this.logger.info(`Waiting for ${stateField} ${targetState} on ${this.channel}`, {
      component: COMPONENT,
      timeoutS: readinessTimeoutMs / 1000,
    });

    while (this.clock.now() - windowStart < readinessTimeoutMs) {
      this.throwIfInterrupted(signal);

      if (this.liveness.stale(this.clock.now(), stalenessThresholdMs)) {
        this.logger.warn(`No successful read for more than ${stalenessThresholdMs / 1000}s`, {
          component: COMPONENT,
          channel: this.channel,
        });
        await this.restartSubsystem(signal);
        windowStart = this.clock.now();
        consecutiveFailures = 0;
        continue;
      }

      const outcome = await this.probe.probe(this.channel, this.config.probeTimeoutMs, signal);
      this.throwIfInterrupted(signal);
      const now = this.clock.now();
      this.emit("probe:result", { outcome, at: now });

      let value: string | undefined;
      if (outcome.ok) {
        value = outcome.value;
        consecutiveFailures = 0;
        this.liveness.recordSuccess(now);
        if (value === targetState) {
          this.logger.info(`${stateField} reached ${targetState}, subsystem is ready`, {
            component: COMPONENT,
          });
          return;
        }
      } else {
        consecutiveFailures++;
        this.logger.warn(outcome.error.message, { component: COMPONENT, code: outcome.error.code });
        if (consecutiveFailures === this.config.consecutiveFailureWarnThreshold) {
          this.logger.warn(`Too many consecutive failed reads (${consecutiveFailures}), restart likely`, {
            component: COMPONENT,
          });
        }
      }

      const waited = Math.floor((now - windowStart) / 1000);
      const sinceRead = Math.floor((this.liveness.elapsed(now) ?? 0) / 1000);
      this.logger.info(
        `Current ${stateField}: ${value ?? "none"} (waiting ${waited}/${readinessTimeoutMs / 1000}s, last read: ${sinceRead}s ago)`,
        { component: COMPONENT },
      );

      await this.clock.sleep(this.config.pollIntervalMs, signal);
    }

    throw new ReadinessTimeoutError(
      `Timeout waiting for ${stateField} ${targetState} after ${readinessTimeoutMs / 1000}s`,
    );
  }

  private async restartSubsystem(signal: AbortSignal): Promise<void> {
    this.phase = "subsystem restart";
    this.transition("RESTARTING");

    const maxAttempts = this.restartPolicy.maxAttempts;
    const attempt = this.restartPolicy.recordAttempt();
    this.logger.warn(`Restarting subsystem (attempt ${attempt}/${maxAttempts})`, { component: COMPONENT });
    this.emit("restart:attempt", { attempt, maxAttempts });

    if (this.subsystem) {
      const status = await this.subsystem.terminate(this.config.killGracePeriodMs);
      if (!status) this.survivors.push(this.subsystem);
      this.subsystem = undefined;
    }

    await this.clock.sleep(this.config.restartPauseMs, signal);
    this.throwIfInterrupted(signal);

    try {
      await this.launchSubsystem(signal);
      this.logger.info("Subsystem restarted", { component: COMPONENT, attempt });
    } catch (err) {
      if (!(err instanceof LaunchError)) throw err;
      this.logger.error(`Failed to restart subsystem (attempt ${attempt}/${maxAttempts})`, {
        component: COMPONENT,
        error: err,
      });
      if (this.restartPolicy.exhausted) {
        throw new RestartBudgetExhaustedError(maxAttempts, { cause: err });
      }
    }

    this.liveness.recordReset(this.clock.now());
    this.phase = "readiness wait";
    this.transition("AWAIT_READY");
  }

  // ---------------------------------------------------------------------------
  // Monitoring
  // ---------------------------------------------------------------------------

  private async monitor(signal: AbortSignal): Promise<ChildExit> {
    this.logger.info("Startup complete, monitoring processes", { component: COMPONENT });

    for (;;) {
      for (const proc of [this.subsystem, this.main]) {
        const status = proc?.exitStatus;
        if (proc && status) {
          this.logger.warn(`${proc.role} process exited with code ${status.code ?? "null"}`, {
            component: COMPONENT,
            signal: status.signal ?? undefined,
          });
          return { role: proc.role, status };
        }
      }
      this.throwIfInterrupted(signal);
      await this.clock.sleep(this.config.monitorIntervalMs, signal);
    }
  }

  // ---------------------------------------------------------------------------
  // Termination
  // ---------------------------------------------------------------------------

  private settleFailure(err: unknown): SupervisorOutcome {
    if (err instanceof InterruptedError) {
      this.transition("TERMINATED");
      return this.outcome({ exitCode: 0, state: "TERMINATED", interrupted: true });
    }
    const error = toSupervisorError(err);
    this.transition("ABORTED");
    return this.outcome({ exitCode: 1, state: "ABORTED", phase: this.phase, error });
  }

  /** Stop every live child, main first, then any restart survivors. Runs at most once. */
  private shutdown(): Promise<void> {
    this.shutdownPromise ??= this.stopChildren();
    return this.shutdownPromise;
  }

  private async stopChildren(): Promise<void> {
    for (const proc of [this.main, this.subsystem, ...this.survivors]) {
      if (!proc || proc.pollExited()) continue;
      this.logger.info(`Stopping ${proc.role} process`, { component: COMPONENT, pid: proc.pid });
      await proc.terminate(this.config.killGracePeriodMs);
    }
  }

  private report(outcome: SupervisorOutcome): void {
    if (outcome.state === "ABORTED") {
      const message = outcome.error?.message ?? "unknown error";
      this.logger.error(`Startup aborted during ${outcome.phase ?? "startup"}: ${message}`, {
        component: COMPONENT,
        code: outcome.error?.code,
      });
    } else if (outcome.interrupted) {
      this.logger.info("Interrupted, supervisor stopped", { component: COMPONENT });
    } else if (outcome.childExit) {
      this.logger.info(`Supervisor stopped after ${outcome.childExit.role} process exited`, {
        component: COMPONENT,
      });
    }
  }

  private outcome(
    fields: Omit<SupervisorOutcome, "restarts" | "interrupted"> & { interrupted?: boolean },
  ): SupervisorOutcome {
    return {
      ...fields,
      interrupted: fields.interrupted ?? false,
      restarts: this.restartPolicy.attemptCount,
    };
  }

  private transition(to: SupervisorState): void {
    const from = this.currentState;
    if (!isSupervisorTransitionAllowed(from, to)) {
      throw new Error(`Invalid supervisor transition ${from} -> ${to}`);
    }
    this.currentState = to;
    this.logger.debug?.(`State ${from} -> ${to}`, { component: COMPONENT });
    this.emit("state:changed", { from, to });
  }

  private throwIfInterrupted(signal: AbortSignal): void {
    if (signal.aborted) throw new InterruptedError("Received interrupt signal");
  }
}
