export class SupervisorError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SupervisorError";
    this.code = code;
  }
}

// ── Process lifecycle ──

export class LaunchError extends SupervisorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "LAUNCH", options);
    this.name = "LaunchError";
  }
}

export class ExitTimeoutError extends SupervisorError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: ErrorOptions) {
    super(message, "EXIT_TIMEOUT", options);
    this.name = "ExitTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

// ── Health probe failures (transient) ──

export class ProbeTimeoutError extends SupervisorError {
  override readonly code = "PROBE_TIMEOUT";

  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROBE_TIMEOUT", options);
    this.name = "ProbeTimeoutError";
  }
}

export class ProbeCommandError extends SupervisorError {
  override readonly code = "PROBE_ERROR";

  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROBE_ERROR", options);
    this.name = "ProbeCommandError";
  }
}

export class FieldMissingError extends SupervisorError {
  override readonly code = "FIELD_MISSING";
  readonly field: string;

  constructor(message: string, field: string, options?: ErrorOptions) {
    super(message, "FIELD_MISSING", options);
    this.name = "FieldMissingError";
    this.field = field;
  }
}

export type ProbeFailure = ProbeTimeoutError | ProbeCommandError | FieldMissingError;

// ── Fatal run outcomes ──

export class ReadinessTimeoutError extends SupervisorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "READINESS_TIMEOUT", options);
    this.name = "ReadinessTimeoutError";
  }
}

export class RestartBudgetExhaustedError extends SupervisorError {
  readonly maxAttempts: number;

  constructor(maxAttempts: number, options?: ErrorOptions) {
    super(`Exceeded maximum restart attempts (${maxAttempts})`, "RESTART_EXHAUSTED", options);
    this.name = "RestartBudgetExhaustedError";
    this.maxAttempts = maxAttempts;
  }
}

export class InterruptedError extends SupervisorError {
  constructor(message = "Interrupted", options?: ErrorOptions) {
    super(message, "INTERRUPTED", options);
    this.name = "InterruptedError";
  }
}

export class ConfigError extends SupervisorError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to SupervisorError (preserves cause chain). */
export function toSupervisorError(value: unknown): SupervisorError {
  if (value instanceof SupervisorError) return value;
  if (value instanceof Error) return new SupervisorError(value.message, "UNKNOWN", { cause: value });
  return new SupervisorError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
