/**
 * startup-supervisor public API barrel.
 *
 * Re-exports the supervisor, its building blocks, the Node adapters and the
 * configuration helpers.
 * @module
 */

// Adapters
export type { CommandHealthProbeOptions } from "./adapters/command-health-probe.js";
export { CommandHealthProbe } from "./adapters/command-health-probe.js";
export { NodeCommandRunner } from "./adapters/node-command-runner.js";
export { NodeProcessManager } from "./adapters/node-process-manager.js";
export type { LogFormat, StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export { SystemClock } from "./adapters/system-clock.js";
// Config
export { supervisorConfigSchema } from "./config/config-schema.js";
export type { LoadConfigOptions } from "./config/load-config.js";
export { ROBOT_NAME_ENV, loadConfig, readConfigFile } from "./config/load-config.js";
// Core
export type { CommandDescriptor, CommandSpec } from "./core/command-descriptor.js";
export { buildSpawnEnv, createCommandDescriptor, formatCommand } from "./core/command-descriptor.js";
export { LivenessTracker } from "./core/liveness-tracker.js";
export type { LaunchOptions, ProcessRole } from "./core/managed-process.js";
export { ManagedProcess } from "./core/managed-process.js";
export { RestartPolicy } from "./core/restart-policy.js";
export type {
  ChildExit,
  StartupSupervisorOptions,
  SupervisorEventMap,
  SupervisorOutcome,
  SupervisorPhase,
} from "./core/startup-supervisor.js";
export { StartupSupervisor } from "./core/startup-supervisor.js";
export type { FieldParser } from "./core/status-parser.js";
export { lineFieldParser } from "./core/status-parser.js";
export type { SupervisorState, TerminalState } from "./core/supervisor-state.js";
export {
  SUPERVISOR_STATES,
  isSupervisorTransitionAllowed,
  isTerminalState,
} from "./core/supervisor-state.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";
// Signals
export type { SignalHandlerOptions, SignalTarget } from "./daemon/signal-handler.js";
export { registerSignalHandlers } from "./daemon/signal-handler.js";
// Errors
export type { ProbeFailure } from "./errors.js";
export {
  ConfigError,
  ExitTimeoutError,
  FieldMissingError,
  InterruptedError,
  LaunchError,
  ProbeCommandError,
  ProbeTimeoutError,
  ReadinessTimeoutError,
  RestartBudgetExhaustedError,
  SupervisorError,
  errorMessage,
  toSupervisorError,
} from "./errors.js";
// Interfaces
export type { Clock } from "./interfaces/clock.js";
export type {
  CommandRunner,
  CommandRunnerResult,
  CommandRunOptions,
} from "./interfaces/command-runner.js";
export type { HealthProbe, ProbeOutcome } from "./interfaces/health-probe.js";
export type { LogContext, Logger } from "./interfaces/logger.js";
export type {
  ExitStatus,
  ProcessHandle,
  ProcessManager,
  SpawnOptions,
  StopSignal,
} from "./interfaces/process-manager.js";
// Types
export type { ResolvedConfig, SupervisorConfig } from "./types/config.js";
export {
  DEFAULT_CONFIG,
  defaultMainCommand,
  resolveChannelName,
  resolveConfig,
} from "./types/config.js";
export { noopLogger } from "./utils/noop-logger.js";
