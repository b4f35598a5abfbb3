/**
 * Command Descriptor — immutable description of an external process launch.
 *
 * @module Launch
 */

/** Configuration-level shape of a launch command. */
export interface CommandSpec {
  command: string;
  args?: string[];
  /** Extra environment variables for this command only. */
  env?: Record<string, string>;
}

export interface CommandDescriptor {
  readonly command: string;
  readonly args: readonly string[];
  /** Overlay applied on top of the supervisor's base environment. */
  readonly env: Readonly<Record<string, string>>;
}

/**
 * Freeze a command spec into a descriptor. `overlay` (the output-unbuffering
 * flags) is applied last so a command cannot switch line buffering back off.
 */
export function createCommandDescriptor(
  spec: CommandSpec,
  overlay: Readonly<Record<string, string>> = {},
): CommandDescriptor {
  if (!spec.command.trim()) {
    throw new TypeError("Command descriptor requires a non-empty command");
  }
  return Object.freeze({
    command: spec.command,
    args: Object.freeze([...(spec.args ?? [])]),
    env: Object.freeze({ ...spec.env, ...overlay }),
  });
}

/** The environment a descriptor's process is spawned with. */
export function buildSpawnEnv(
  base: Readonly<Record<string, string | undefined>>,
  descriptor: CommandDescriptor,
): Record<string, string | undefined> {
  return { ...base, ...descriptor.env };
}

/** Human-readable command line for logs. */
export function formatCommand(descriptor: CommandDescriptor): string {
  return [descriptor.command, ...descriptor.args].join(" ");
}
