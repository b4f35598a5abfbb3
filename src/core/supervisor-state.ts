/**
 * Supervisor State — the startup sequence as an explicit state machine.
 *
 * INIT → LAUNCH_SUBSYSTEM → AWAIT_READY ⇄ RESTARTING
 *                               ↓
 *                          LAUNCH_MAIN → RUNNING
 *
 * Every non-terminal state may end in ABORTED or TERMINATED (interrupt).
 *
 * @module Supervisor
 */

export const SUPERVISOR_STATES = [
  "INIT",
  "LAUNCH_SUBSYSTEM",
  "AWAIT_READY",
  "LAUNCH_MAIN",
  "RUNNING",
  "RESTARTING",
  "ABORTED",
  "TERMINATED",
] as const;

export type SupervisorState = (typeof SUPERVISOR_STATES)[number];

export type TerminalState = Extract<SupervisorState, "ABORTED" | "TERMINATED">;

const ALLOWED_TRANSITIONS: Record<SupervisorState, ReadonlySet<SupervisorState>> = {
  INIT: new Set(["LAUNCH_SUBSYSTEM", "ABORTED", "TERMINATED"]),
  LAUNCH_SUBSYSTEM: new Set(["AWAIT_READY", "ABORTED", "TERMINATED"]),
  AWAIT_READY: new Set(["RESTARTING", "LAUNCH_MAIN", "ABORTED", "TERMINATED"]),
  RESTARTING: new Set(["AWAIT_READY", "ABORTED", "TERMINATED"]),
  LAUNCH_MAIN: new Set(["RUNNING", "ABORTED", "TERMINATED"]),
  RUNNING: new Set(["TERMINATED", "ABORTED"]),
  ABORTED: new Set(),
  TERMINATED: new Set(),
};

export function isSupervisorTransitionAllowed(from: SupervisorState, to: SupervisorState): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

export function isTerminalState(state: SupervisorState): state is TerminalState {
  return state === "ABORTED" || state === "TERMINATED";
}
