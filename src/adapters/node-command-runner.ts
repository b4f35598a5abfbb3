import { execFile } from "node:child_process";
import type {
  CommandRunner,
  CommandRunnerResult,
  CommandRunOptions,
} from "../interfaces/command-runner.js";

const MAX_OUTPUT_BYTES = 1024 * 1024;

/**
 * Runs commands with execFile (no shell, so arguments are never interpolated).
 * A command that outlives `timeoutMs` is killed and reported with `timedOut: true`;
 * one that overflows the output buffer rejects.
 */
export class NodeCommandRunner implements CommandRunner {
  run(
    command: string,
    args: readonly string[],
    options: CommandRunOptions,
  ): Promise<CommandRunnerResult> {
    const start = Date.now();

    return new Promise<CommandRunnerResult>((resolve, reject) => {
      execFile(
        command,
        args,
        {
          encoding: "utf-8",
          timeout: options.timeoutMs,
          killSignal: "SIGKILL",
          maxBuffer: MAX_OUTPUT_BYTES,
          env: options.env,
          signal: options.signal,
        },
        (error, stdout, stderr) => {
          const durationMs = Date.now() - start;
          if (!error) {
            resolve({ stdout, stderr, exitCode: 0, timedOut: false, durationMs });
            return;
          }
          if (typeof error.code === "number") {
            resolve({ stdout, stderr, exitCode: error.code, timedOut: false, durationMs });
            return;
          }
          // Spawn failures, aborts and output overflow all carry a string code.
          if (typeof error.code === "string" || options.signal?.aborted) {
            reject(error);
            return;
          }
          if (error.killed) {
            resolve({ stdout, stderr, exitCode: null, timedOut: true, durationMs });
            return;
          }
          if (error.signal) {
            resolve({ stdout, stderr, exitCode: null, timedOut: false, durationMs });
            return;
          }
          reject(error);
        },
      );
    });
  }
}
