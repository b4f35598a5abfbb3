import type { ProbeFailure } from "../errors.js";
import { FieldMissingError, ProbeCommandError, ProbeTimeoutError, errorMessage } from "../errors.js";
import type { CommandRunner, CommandRunnerResult } from "../interfaces/command-runner.js";
import type { HealthProbe, ProbeOutcome } from "../interfaces/health-probe.js";
import type { Logger } from "../interfaces/logger.js";
import type { FieldParser } from "../core/status-parser.js";
import { lineFieldParser } from "../core/status-parser.js";
import { noopLogger } from "../utils/noop-logger.js";

export interface CommandHealthProbeOptions {
  runner: CommandRunner;
  /** Query executable, e.g. "rostopic". */
  command: string;
  /** Arguments placed before the channel name, e.g. ["echo", "-n", "1"]. */
  args: readonly string[];
  /** Field whose value is returned. Used for the default parser and error messages. */
  field: string;
  parser?: FieldParser;
  env?: Record<string, string | undefined>;
  logger?: Logger;
}

const PREVIEW_LENGTH = 50;

/**
 * Health probe backed by a one-shot status query command: runs
 * `<command> <args...> <channel>` once and extracts a single field from its
 * text output.
 */
export class CommandHealthProbe implements HealthProbe {
  private readonly runner: CommandRunner;
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly field: string;
  private readonly parser: FieldParser;
  private readonly env: Record<string, string | undefined> | undefined;
  private readonly logger: Logger;

  constructor(options: CommandHealthProbeOptions) {
    this.runner = options.runner;
    this.command = options.command;
    this.args = [...options.args];
    this.field = options.field;
    this.parser = options.parser ?? lineFieldParser(options.field);
    this.env = options.env;
    this.logger = options.logger ?? noopLogger;
  }

  async probe(channel: string, timeoutMs: number, signal?: AbortSignal): Promise<ProbeOutcome> {
    let result: CommandRunnerResult;
    try {
      result = await this.runner.run(this.command, [...this.args, channel], {
        timeoutMs,
        env: this.env,
        signal,
      });
    } catch (err) {
      return failed(new ProbeCommandError(`Error querying ${channel}: ${errorMessage(err)}`, { cause: err }));
    }

    if (result.timedOut) {
      return failed(new ProbeTimeoutError(`Timeout reading ${channel} after ${timeoutMs}ms`));
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode ?? "null"}`;
      return failed(new ProbeCommandError(`Failed to read ${channel}: ${detail}`));
    }

    const output = result.stdout.trim();
    this.logger.debug?.(`Retrieved from ${channel}`, {
      component: "probe",
      preview: output.slice(0, PREVIEW_LENGTH),
    });

    const value = this.parser(output);
    if (value === undefined) {
      return failed(new FieldMissingError(`Field "${this.field}" missing from ${channel} output`, this.field));
    }

    this.logger.debug?.(`Parsed ${this.field} value: ${value}`, { component: "probe" });
    return { ok: true, value };
  }
}

function failed(error: ProbeFailure): ProbeOutcome {
  return { ok: false, error };
}
