import { readFile } from "node:fs/promises";
import { ConfigError, errorMessage } from "../errors.js";
import type { ResolvedConfig, SupervisorConfig } from "../types/config.js";
import { resolveConfig } from "../types/config.js";
import { supervisorConfigSchema } from "./config-schema.js";

/** Environment variable naming the robot whose status channel is probed. */
export const ROBOT_NAME_ENV = "ROBOT_NAME";

export interface LoadConfigOptions {
  /** Optional JSON file with SupervisorConfig fields. */
  configPath?: string;
  env?: Readonly<Record<string, string | undefined>>;
  /** Highest-precedence values (CLI flags). */
  overrides?: SupervisorConfig;
}

/**
 * Build the run's configuration once, at startup.
 * Precedence: defaults < config file < ROBOT_NAME < overrides.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const fromFile = options.configPath ? await readConfigFile(options.configPath) : {};

  const fromEnv: SupervisorConfig = {};
  const robotName = options.env?.[ROBOT_NAME_ENV]?.trim();
  if (robotName) fromEnv.robotName = robotName;

  return resolveConfig({ ...fromFile, ...fromEnv, ...options.overrides });
}

export async function readConfigFile(path: string): Promise<SupervisorConfig> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const validation = supervisorConfigSchema.safeParse(parsed);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration in ${path}: ${validation.error.message}`);
  }
  return validation.data;
}
