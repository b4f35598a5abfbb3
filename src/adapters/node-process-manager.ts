import { spawn as nodeSpawn } from "node:child_process";
import { LaunchError } from "../errors.js";
import type {
  ExitStatus,
  ProcessHandle,
  ProcessManager,
  SpawnOptions,
  StopSignal,
} from "../interfaces/process-manager.js";

/**
 * Node.js process manager using child_process.spawn.
 *
 * Children inherit stdout/stderr so high-volume output goes straight to the
 * supervisor's streams instead of filling a pipe nobody drains.
 */
export class NodeProcessManager implements ProcessManager {
  spawn(options: SpawnOptions): ProcessHandle {
    const child = nodeSpawn(options.command, options.args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "inherit", "inherit"],
    });

    // Attach an early error listener immediately after spawn() so ENOENT-style
    // failures cannot surface as unhandled exceptions before we build the handle.
    const earlyErrorListener = () => {};
    child.on("error", earlyErrorListener);

    if (typeof child.pid !== "number") {
      throw new LaunchError(`Failed to spawn process: ${options.command}`);
    }

    const pid = child.pid;

    const exited = new Promise<ExitStatus>((resolve) => {
      child.on("exit", (code, signal) => {
        resolve({ code, signal });
      });
      child.on("error", () => {
        resolve({ code: null, signal: null });
      });
    });

    child.off("error", earlyErrorListener);

    return {
      pid,
      exited,
      kill(signal: StopSignal = "SIGTERM") {
        return child.kill(signal);
      },
    };
  }
}
