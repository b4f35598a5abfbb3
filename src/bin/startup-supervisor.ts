#!/usr/bin/env node
import { CommandHealthProbe } from "../adapters/command-health-probe.js";
import { NodeCommandRunner } from "../adapters/node-command-runner.js";
import { NodeProcessManager } from "../adapters/node-process-manager.js";
import type { LogFormat } from "../adapters/structured-logger.js";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { SystemClock } from "../adapters/system-clock.js";
import { loadConfig } from "../config/load-config.js";
import { StartupSupervisor } from "../core/startup-supervisor.js";
import { registerSignalHandlers } from "../daemon/signal-handler.js";
import { ConfigError } from "../errors.js";
import type { ResolvedConfig, SupervisorConfig } from "../types/config.js";

// ── Types ──────────────────────────────────────────────────────────────────

interface CliArgs {
  configPath?: string;
  overrides: SupervisorConfig;
  logFormat: LogFormat;
  verbose: boolean;
}

// ── Arg parsing ────────────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
  startup-supervisor — bring up the robot stack in order

  Launches the state subsystem, waits until the robot reports the target
  state, then launches the main startup file and watches both processes.

  Usage: startup-supervisor [options]

  Options:
    --config <path>        JSON configuration file
    --robot-name <name>    Robot whose status channel is read (env: ROBOT_NAME, default: zj_humanoid)
    --target-state <v>     State value that means ready (default: 5)
    --log-format <fmt>     text | json (default: text)
    --verbose, -v          Verbose logging
    --help, -h             Show this help
`);
}

function fail(message: string): never {
  console.error(`${message}\nRun with --help for usage.`);
  process.exit(1);
}

function valueFor(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith("-")) {
    fail(`Error: ${flag} requires a value`);
  }
  return value;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { overrides: {}, logFormat: "text", verbose: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config":
        args.configPath = valueFor(argv, ++i, arg);
        break;
      case "--robot-name":
        args.overrides.robotName = valueFor(argv, ++i, arg);
        break;
      case "--target-state":
        args.overrides.targetState = valueFor(argv, ++i, arg);
        break;
      case "--log-format": {
        const format = valueFor(argv, ++i, arg);
        if (format !== "text" && format !== "json") {
          fail(`Error: --log-format must be "text" or "json"`);
        }
        args.logFormat = format;
        break;
      }
      case "--verbose":
      case "-v":
        args.verbose = true;
        break;
      case "--help":
      case "-h":
        printHelp();
        process.exit(0);
        break;
      default:
        fail(`Unknown option: ${arg}`);
    }
  }

  return args;
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  const logger = new StructuredLogger({
    component: "supervisor",
    level: args.verbose ? LogLevel.DEBUG : LogLevel.INFO,
    format: args.logFormat,
  });

  let config: ResolvedConfig;
  try {
    config = await loadConfig({ configPath: args.configPath, env: process.env, overrides: args.overrides });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message, { code: err.code });
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const probe = new CommandHealthProbe({
    runner: new NodeCommandRunner(),
    command: config.probe.command,
    args: config.probe.args,
    field: config.stateField,
    env: process.env,
    logger,
  });
  const supervisor = new StartupSupervisor({
    config,
    processManager: new NodeProcessManager(),
    probe,
    clock: new SystemClock(),
    logger,
    baseEnv: process.env,
  });

  const controller = new AbortController();
  const disposeSignals = registerSignalHandlers(() => controller.abort(), {
    logger,
    timeoutMs: config.shutdownTimeoutMs,
  });

  logger.info(`Starting supervisor for robot ${config.robotName}`, {
    channel: supervisor.channel,
    target: config.targetState,
  });

  try {
    const outcome = await supervisor.run(controller.signal);
    process.exitCode = outcome.exitCode;
  } finally {
    disposeSignals();
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
