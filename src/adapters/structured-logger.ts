import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const RESERVED_KEYS = new Set(["time", "level", "msg", "component"]);

export type LogFormat = "text" | "json";

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  /** Default source tag. A `component` key in ctx takes precedence for that line. */
  component?: string;
  format?: LogFormat;
  now?: () => Date;
}

/**
 * One line per event.
 *
 * text: `2026-01-02T03:04:05.000Z [INFO] [supervisor] Subsystem started pid=42`
 * json: `{"time":"...","level":"INFO","component":"supervisor","msg":"...","pid":42}`
 */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;
  private format: LogFormat;
  private now: () => Date;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stdout.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.format = options.format ?? "text";
    this.now = options.now ?? (() => new Date());
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.emit(LogLevel.ERROR, msg, ctx);
  }

  private emit(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const time = this.now().toISOString();
    const component =
      typeof ctx?.component === "string" && ctx.component ? ctx.component : this.component;
    const fields: Array<[string, unknown]> = ctx
      ? Object.entries(ctx).filter(([key]) => !RESERVED_KEYS.has(key))
      : [];

    if (this.format === "json") {
      this.writeJson(time, level, component, msg, fields);
    } else {
      this.writer(formatTextLine(time, LEVEL_NAMES[level], component, msg, fields));
    }
  }

  private writeJson(
    time: string,
    level: LogLevel,
    component: string | undefined,
    msg: string,
    fields: Array<[string, unknown]>,
  ): void {
    const entry: Record<string, unknown> = { time, level: LEVEL_NAMES[level] };
    if (component) entry.component = component;
    entry.msg = msg;

    for (const [key, value] of fields) {
      if (value instanceof Error) {
        entry[key] = value.message;
        entry[`${key}Stack`] = value.stack;
      } else {
        entry[key] = value;
      }
    }

    try {
      this.writer(JSON.stringify(entry));
    } catch {
      // Circular reference or BigInt in ctx
      this.writer(JSON.stringify({ time, level: entry.level, msg, serializationError: true }));
    }
  }
}

function formatTextLine(
  time: string,
  level: string,
  component: string | undefined,
  msg: string,
  fields: Array<[string, unknown]>,
): string {
  const parts = [time, `[${level}]`];
  if (component) parts.push(`[${component}]`);
  parts.push(msg);
  for (const [key, value] of fields) {
    if (value === undefined) continue;
    parts.push(`${key}=${formatValue(value)}`);
  }
  return parts.join(" ");
}

function formatValue(value: unknown): string {
  if (value instanceof Error) return formatValue(value.message);
  if (typeof value === "string") {
    return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
  }
  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return "[unserializable]";
  }
}
