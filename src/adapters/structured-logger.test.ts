import { describe, expect, it } from "vitest";
import { LogLevel, StructuredLogger } from "./structured-logger.js";

const FIXED = new Date("2026-01-02T03:04:05.000Z");

function capture(options: ConstructorParameters<typeof StructuredLogger>[0] = {}) {
  const lines: string[] = [];
  const logger = new StructuredLogger({
    writer: (line) => lines.push(line),
    now: () => FIXED,
    ...options,
  });
  return { lines, logger };
}

describe("StructuredLogger", () => {
  describe("text format", () => {
    it("writes time, level tag, source tag and message on one line", () => {
      const { lines, logger } = capture({ component: "supervisor" });

      logger.info("Subsystem started", { pid: 42 });

      expect(lines).toEqual(["2026-01-02T03:04:05.000Z [INFO] [supervisor] Subsystem started pid=42"]);
    });

    it("lets ctx.component override the source tag", () => {
      const { lines, logger } = capture({ component: "supervisor" });

      logger.warn("Timeout reading channel", { component: "probe" });

      expect(lines[0]).toBe("2026-01-02T03:04:05.000Z [WARN] [probe] Timeout reading channel");
    });

    it("omits the source tag when none is configured", () => {
      const { lines, logger } = capture();

      logger.error("boom");

      expect(lines[0]).toBe("2026-01-02T03:04:05.000Z [ERROR] boom");
    });

    it("quotes strings containing whitespace and renders errors by message", () => {
      const { lines, logger } = capture();

      logger.info("probe failed", { channel: "/r/state", detail: "no such topic", error: new Error("bad exit") });

      expect(lines[0]).toBe(
        '2026-01-02T03:04:05.000Z [INFO] probe failed channel=/r/state detail="no such topic" error="bad exit"',
      );
    });

    it("skips undefined values and serializes objects as JSON", () => {
      const { lines, logger } = capture();

      logger.info("exit", { status: { code: 0, signal: null }, extra: undefined });

      expect(lines[0]).toBe('2026-01-02T03:04:05.000Z [INFO] exit status={"code":0,"signal":null}');
    });
  });

  describe("json format", () => {
    it("outputs JSON lines to the writer", () => {
      const { lines, logger } = capture({ format: "json" });

      logger.info("server started", { port: 3456 });

      const parsed = JSON.parse(lines[0]);
      expect(parsed).toEqual({
        time: "2026-01-02T03:04:05.000Z",
        level: "INFO",
        msg: "server started",
        port: 3456,
      });
    });

    it("serializes error objects with stack", () => {
      const { lines, logger } = capture({ format: "json" });

      logger.error("failed", { error: new Error("boom") });

      const parsed = JSON.parse(lines[0]);
      expect(parsed.error).toBe("boom");
      expect(parsed.errorStack).toContain("Error: boom");
    });

    it("does not allow ctx to overwrite reserved fields", () => {
      const { lines, logger } = capture({ format: "json", component: "test" });

      logger.info("spoofed", { level: "debug", time: "fake", msg: "injected" });

      const parsed = JSON.parse(lines[0]);
      expect(parsed.level).toBe("INFO");
      expect(parsed.msg).toBe("spoofed");
      expect(parsed.component).toBe("test");
      expect(parsed.time).toBe("2026-01-02T03:04:05.000Z");
    });

    it("survives circular references in ctx", () => {
      const { lines, logger } = capture({ format: "json" });

      const circular: Record<string, unknown> = { key: "value" };
      circular.self = circular;

      logger.error("circular data", circular);

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toEqual({
        time: "2026-01-02T03:04:05.000Z",
        level: "ERROR",
        msg: "circular data",
        serializationError: true,
      });
    });
  });

  it("respects log level filtering", () => {
    const { lines, logger } = capture({ level: LogLevel.WARN });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("visible");
    logger.error("visible");

    expect(lines).toHaveLength(2);
  });

  it("defaults to INFO, dropping debug lines", () => {
    const { lines, logger } = capture();

    logger.debug("hidden");
    logger.info("shown");

    expect(lines).toEqual(["2026-01-02T03:04:05.000Z [INFO] shown"]);
  });
});
