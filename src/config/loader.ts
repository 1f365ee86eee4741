import { readFile } from "node:fs/promises";
import path from "node:path";
import type { LogLevel } from "../core/observability.js";
import { isLogLevel, LOG_LEVELS } from "../core/observability.js";
import { ConfigParseError, parseConfig } from "./parser.js";
import type { GreenloopConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "greenloop.yaml";

export interface ConfigOverrides {
  workspace?: string;
  maxIterations?: number;
  stagnationThreshold?: number;
  logLevel?: LogLevel;
  /** `false` disables publication regardless of the file. */
  publish?: boolean;
}

/**
 * Read a config file and resolve `workspace` against the file's directory.
 * The returned workspace is absolute.
 */
export async function loadConfigFile(configPath: string): Promise<GreenloopConfig> {
  const absolute = path.resolve(configPath);
  let text: string;
  try {
    text = await readFile(absolute, "utf-8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigParseError(`cannot read config file ${absolute}: ${msg}`);
  }
  const config = parseConfig(text);
  return { ...config, workspace: path.resolve(path.dirname(absolute), config.workspace) };
}

function envPositiveInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigParseError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

/** GREENLOOP_MAX_ITERATIONS, GREENLOOP_LOG_LEVEL and GREENLOOP_WORKSPACE. */
export function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const maxIterations = envPositiveInt(env, "GREENLOOP_MAX_ITERATIONS");
  if (maxIterations !== undefined) overrides.maxIterations = maxIterations;

  const logLevel = env["GREENLOOP_LOG_LEVEL"];
  if (logLevel !== undefined && logLevel !== "") {
    if (!isLogLevel(logLevel)) {
      throw new ConfigParseError(
        `GREENLOOP_LOG_LEVEL must be one of: ${LOG_LEVELS.join(", ")} (got "${logLevel}")`,
      );
    }
    overrides.logLevel = logLevel;
  }

  const workspace = env["GREENLOOP_WORKSPACE"];
  if (workspace !== undefined && workspace !== "") overrides.workspace = workspace;
  return overrides;
}

/** Later layers win. Workspace overrides resolve against the process cwd. */
export function applyOverrides(config: GreenloopConfig, ...layers: ConfigOverrides[]): GreenloopConfig {
  let out = config;
  for (const layer of layers) {
    out = {
      ...out,
      ...(layer.workspace !== undefined ? { workspace: path.resolve(layer.workspace) } : {}),
      ...(layer.logLevel !== undefined ? { logLevel: layer.logLevel } : {}),
      limits: {
        ...out.limits,
        ...(layer.maxIterations !== undefined ? { maxIterations: layer.maxIterations } : {}),
        ...(layer.stagnationThreshold !== undefined ? { stagnationThreshold: layer.stagnationThreshold } : {}),
      },
      publish: {
        ...out.publish,
        ...(layer.publish === false ? { enabled: false } : {}),
      },
    };
  }
  return out;
}

export async function loadConfig(
  configPath: string,
  cliOverrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): Promise<GreenloopConfig> {
  const fromFile = await loadConfigFile(configPath);
  return applyOverrides(fromFile, envOverrides(env), cliOverrides);
}
