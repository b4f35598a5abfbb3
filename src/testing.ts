/**
 * Public test utilities — exported from the `"startup-supervisor/testing"` entry point.
 * Consumers can import these doubles to drive a supervisor deterministically.
 */
export { ManualClock } from "./testing/manual-clock.js";
export { MockCommandRunner } from "./testing/mock-command-runner.js";
export type { MockProcessHandle, MockProcessManagerOptions } from "./testing/mock-process-manager.js";
export { MockProcessManager } from "./testing/mock-process-manager.js";
export type { LogRecord, RecordedLevel } from "./testing/recording-logger.js";
export { RecordingLogger } from "./testing/recording-logger.js";
export type { ProbeCall, ProbeScript } from "./testing/scripted-health-probe.js";
export {
  ScriptedHealthProbe,
  fieldMissing,
  probeError,
  probeTimeout,
  probeValue,
} from "./testing/scripted-health-probe.js";
export { noopLogger } from "./utils/noop-logger.js";
