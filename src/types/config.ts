import { supervisorConfigSchema } from "../config/config-schema.js";
import type { CommandSpec } from "../core/command-descriptor.js";
import { ConfigError } from "../errors.js";

/** Supervisor configuration; every field falls back to DEFAULT_CONFIG. */
export interface SupervisorConfig {
  /** Identifier substituted into the channel template (env: ROBOT_NAME). */
  robotName?: string; // default: "zj_humanoid"
  channelTemplate?: string; // default: "/{robotName}/robot/robot_state"
  /** Working directory for both children; also locates the default main launch file. */
  workspaceRoot?: string; // default: "/home/nav01/zj_humanoid"

  // Commands
  subsystem?: CommandSpec; // default: roslaunch robot_state robot_state.launch --screen
  main?: CommandSpec; // default: roslaunch --screen <workspaceRoot>/startup/robot_startUp.launch
  probe?: { command: string; args: string[] }; // default: rostopic echo -n 1
  stateField?: string; // default: "state"
  targetState?: string; // default: "5"

  // Timing
  settleDelayMs?: number; // default: 5000
  pollIntervalMs?: number; // default: 1000
  readinessTimeoutMs?: number; // default: 600000
  probeTimeoutMs?: number; // default: 5000
  stalenessThresholdMs?: number; // default: 15000
  restartPauseMs?: number; // default: 2000
  killGracePeriodMs?: number; // default: 5000
  monitorIntervalMs?: number; // default: 1000
  shutdownTimeoutMs?: number; // default: 30000

  // Recovery
  maxRestartAttempts?: number; // default: 3
  consecutiveFailureWarnThreshold?: number; // default: 30

  /** Forced into every child's environment so its logs are not held back by buffering. */
  unbufferedEnv?: Record<string, string>;
}

/** Fully resolved configuration with defaults applied. */
export type ResolvedConfig = Required<Omit<SupervisorConfig, "main">> & { main: CommandSpec };

export const DEFAULT_CONFIG: Readonly<Omit<ResolvedConfig, "main">> = {
  robotName: "zj_humanoid",
  channelTemplate: "/{robotName}/robot/robot_state",
  workspaceRoot: "/home/nav01/zj_humanoid",
  subsystem: {
    command: "roslaunch",
    args: ["robot_state", "robot_state.launch", "--screen"],
  },
  probe: { command: "rostopic", args: ["echo", "-n", "1"] },
  stateField: "state",
  targetState: "5",
  settleDelayMs: 5000,
  pollIntervalMs: 1000,
  readinessTimeoutMs: 600000,
  probeTimeoutMs: 5000,
  stalenessThresholdMs: 15000,
  restartPauseMs: 2000,
  killGracePeriodMs: 5000,
  monitorIntervalMs: 1000,
  shutdownTimeoutMs: 30000,
  maxRestartAttempts: 3,
  consecutiveFailureWarnThreshold: 30,
  unbufferedEnv: {
    PYTHONUNBUFFERED: "1",
    ROSCONSOLE_STDOUT_LINE_BUFFERED: "1",
  },
};

/** Main launch command used when none is configured. */
export function defaultMainCommand(workspaceRoot: string): CommandSpec {
  const root = workspaceRoot.replace(/\/+$/, "");
  return { command: "roslaunch", args: ["--screen", `${root}/startup/robot_startUp.launch`] };
}

export function resolveConfig(config: SupervisorConfig = {}): ResolvedConfig {
  // Validate user-provided config before merging
  const validation = supervisorConfigSchema.safeParse(config);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error.message}`);
  }

  const d = DEFAULT_CONFIG;
  const workspaceRoot = config.workspaceRoot ?? d.workspaceRoot;
  return {
    robotName: config.robotName ?? d.robotName,
    channelTemplate: config.channelTemplate ?? d.channelTemplate,
    workspaceRoot,
    subsystem: config.subsystem ?? d.subsystem,
    main: config.main ?? defaultMainCommand(workspaceRoot),
    probe: config.probe ?? d.probe,
    stateField: config.stateField ?? d.stateField,
    targetState: config.targetState ?? d.targetState,
    settleDelayMs: config.settleDelayMs ?? d.settleDelayMs,
    pollIntervalMs: config.pollIntervalMs ?? d.pollIntervalMs,
    readinessTimeoutMs: config.readinessTimeoutMs ?? d.readinessTimeoutMs,
    probeTimeoutMs: config.probeTimeoutMs ?? d.probeTimeoutMs,
    stalenessThresholdMs: config.stalenessThresholdMs ?? d.stalenessThresholdMs,
    restartPauseMs: config.restartPauseMs ?? d.restartPauseMs,
    killGracePeriodMs: config.killGracePeriodMs ?? d.killGracePeriodMs,
    monitorIntervalMs: config.monitorIntervalMs ?? d.monitorIntervalMs,
    shutdownTimeoutMs: config.shutdownTimeoutMs ?? d.shutdownTimeoutMs,
    maxRestartAttempts: config.maxRestartAttempts ?? d.maxRestartAttempts,
    consecutiveFailureWarnThreshold:
      config.consecutiveFailureWarnThreshold ?? d.consecutiveFailureWarnThreshold,
    unbufferedEnv: config.unbufferedEnv ?? d.unbufferedEnv,
  };
}

/** Status channel queried by the health probe, e.g. "/zj_humanoid/robot/robot_state". */
export function resolveChannelName(config: Pick<ResolvedConfig, "robotName" | "channelTemplate">): string {
  return config.channelTemplate.replaceAll("{robotName}", config.robotName);
}
