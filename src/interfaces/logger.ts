/** Structured fields attached to one log line. `component` names the line's source. */
export type LogContext = Record<string, unknown>;

/**
 * Logger the supervisor writes through. `debug` is optional so that minimal
 * sinks can leave it out; callers use `logger.debug?.(...)`.
 */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
