import YAML from "yaml";
import { isLogLevel, LOG_LEVELS } from "../core/observability.js";
import { parseDuration } from "./duration.js";
import type {
  AgentWorker,
  GeneratorConfig,
  GreenloopConfig,
  LoopSettings,
  PublishConfig,
  PullRequestConfig,
  Timeouts,
} from "./types.js";

const AGENT_WORKERS: readonly AgentWorker[] = ["CLAUDE_CODE", "CODEX_CLI", "OPENCODE"];
const VALID_WORKERS = new Set<string>([...AGENT_WORKERS, "CUSTOM"]);

function isAgentWorker(value: unknown): value is AgentWorker {
  return AGENT_WORKERS.some((w) => w === value);
}

export const DEFAULT_COMPILE_ERROR_PATTERNS: readonly string[] = [
  "COMPILATION ERROR",
  "compil(?:e|ation) error",
  "cannot find symbol",
  "\\.java:\\[\\d+(?:,\\d+)?\\]",
];

export const DEFAULT_LOOP_SETTINGS: LoopSettings = {
  limits: {
    maxIterations: 50,
    stagnationThreshold: 3,
    oscillationCycles: 2,
  },
  timeouts: {
    probeMs: parseDuration("20m"),
    stepMs: parseDuration("30s"),
    generateMs: parseDuration("15m"),
    publishMs: parseDuration("2m"),
  },
  publish: {
    enabled: true,
    remote: "origin",
    retry: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 10000 },
  },
  compileErrorPatterns: [...DEFAULT_COMPILE_ERROR_PATTERNS],
};

const DEFAULT_BUILD_COMMAND = ["mvn", "clean", "verify"];
const DEFAULT_SOURCE_ROOTS = ["src/main/java", "src/test/java"];

export class ConfigParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigParseError";
  }
}

function assertString(value: unknown, field: string): asserts value is string {
  if (typeof value !== "string" || value === "") {
    throw new ConfigParseError(`"${field}" must be a non-empty string`);
  }
}

function assertObject(value: unknown, field: string): asserts value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigParseError(`"${field}" must be an object`);
  }
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  assertString(value, field);
  return value;
}

function optionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigParseError(`"${field}" must be a boolean`);
  }
  return value;
}

function optionalObject(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  assertObject(value, field);
  return value;
}

function parseCommand(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ConfigParseError(`"${field}" must be a non-empty array of strings`);
  }
  const argv: string[] = [];
  for (const part of value) {
    if (typeof part !== "string" || part === "") {
      throw new ConfigParseError(`"${field}" must contain only non-empty strings`);
    }
    argv.push(part);
  }
  return argv;
}

function parseStringList(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(`"${field}" must be an array of strings`);
  }
  return value.map((item, i) => {
    assertString(item, `${field}[${i}]`);
    return item;
  });
}

function parsePositiveInt(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigParseError(`"${field}" must be a positive integer (got ${JSON.stringify(value)})`);
  }
  return value;
}

function parseDurationField(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  assertString(value, field);
  try {
    return parseDuration(value);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigParseError(`"${field}": ${msg}`);
  }
}

function parseTimeouts(value: unknown): Timeouts {
  const obj = optionalObject(value, "timeouts");
  const defaults = DEFAULT_LOOP_SETTINGS.timeouts;
  return {
    probeMs: parseDurationField(obj["probe"], "timeouts.probe", defaults.probeMs),
    stepMs: parseDurationField(obj["step"], "timeouts.step", defaults.stepMs),
    generateMs: parseDurationField(obj["generate"], "timeouts.generate", defaults.generateMs),
    publishMs: parseDurationField(obj["publish"], "timeouts.publish", defaults.publishMs),
  };
}

function parsePullRequest(value: unknown): PullRequestConfig | undefined {
  if (value === undefined || value === null) return undefined;
  assertObject(value, "publish.pull_request");
  const base = value["base"];
  const title = value["title"];
  assertString(base, "publish.pull_request.base");
  assertString(title, "publish.pull_request.title");
  const body = optionalString(value["body"], "publish.pull_request.body");
  return {
    base,
    title,
    ...(body !== undefined ? { body } : {}),
  };
}

function parsePublish(value: unknown): PublishConfig {
  const obj = optionalObject(value, "publish");
  const defaults = DEFAULT_LOOP_SETTINGS.publish;

  const enabled = optionalBoolean(obj["enabled"], "publish.enabled");
  const remote = optionalString(obj["remote"], "publish.remote");

  const retry = optionalObject(obj["retry"], "publish.retry");
  const pullRequest = parsePullRequest(obj["pull_request"]);

  return {
    enabled: enabled ?? defaults.enabled,
    remote: remote ?? defaults.remote,
    ...(pullRequest ? { pullRequest } : {}),
    retry: {
      maxAttempts: parsePositiveInt(retry["max_attempts"], "publish.retry.max_attempts", defaults.retry.maxAttempts),
      baseDelayMs: parseDurationField(retry["base_delay"], "publish.retry.base_delay", defaults.retry.baseDelayMs),
      maxDelayMs: parseDurationField(retry["max_delay"], "publish.retry.max_delay", defaults.retry.maxDelayMs),
    },
  };
}

function parseGenerator(value: unknown): GeneratorConfig {
  assertObject(value, "generator");
  const worker = value["worker"];
  if (worker === "CUSTOM") {
    return { worker, command: parseCommand(value["command"], "generator.command") };
  }
  if (!isAgentWorker(worker)) {
    throw new ConfigParseError(
      `"generator.worker" must be one of: ${[...VALID_WORKERS].join(", ")} (got "${String(worker)}")`,
    );
  }
  const model = optionalString(value["model"], "generator.model");
  return { worker, ...(model !== undefined ? { model } : {}) };
}

function parseCompilePatterns(value: unknown): string[] {
  if (value === undefined) return [...DEFAULT_COMPILE_ERROR_PATTERNS];
  const patterns = parseStringList(value, "compile_error_patterns");
  if (patterns.length === 0) {
    throw new ConfigParseError(`"compile_error_patterns" must not be empty`);
  }
  for (const p of patterns) {
    try {
      new RegExp(p, "i");
    } catch {
      throw new ConfigParseError(`"compile_error_patterns" contains an invalid regular expression: ${p}`);
    }
  }
  return patterns;
}

/**
 * Parse and validate a greenloop YAML document. `workspace` defaults to "."
 * and is returned as written; callers resolve it against the config file.
 */
export function parseConfig(yamlText: string): GreenloopConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(yamlText);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigParseError(`invalid YAML: ${msg}`);
  }
  assertObject(raw, "config");

  const workspace = raw["workspace"] ?? ".";
  assertString(workspace, "workspace");

  const logLevel = raw["log_level"] ?? "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigParseError(
      `"log_level" must be one of: ${LOG_LEVELS.join(", ")} (got "${String(logLevel)}")`,
    );
  }

  const limits = DEFAULT_LOOP_SETTINGS.limits;
  const build = optionalObject(raw["build"], "build");
  const reports = raw["reports"];
  assertObject(reports, "reports");
  const sources = optionalObject(raw["sources"], "sources");

  let ledger: GreenloopConfig["ledger"];
  if (raw["ledger"] !== undefined) {
    const obj = optionalObject(raw["ledger"], "ledger");
    const dir = obj["dir"];
    assertString(dir, "ledger.dir");
    ledger = { dir };
  }

  const roots = sources["roots"] === undefined
    ? [...DEFAULT_SOURCE_ROOTS]
    : parseStringList(sources["roots"], "sources.roots");
  if (roots.length === 0) {
    throw new ConfigParseError(`"sources.roots" must not be empty`);
  }

  return {
    workspace,
    logLevel,
    limits: {
      maxIterations: parsePositiveInt(raw["max_iterations"], "max_iterations", limits.maxIterations),
      stagnationThreshold: parsePositiveInt(raw["stagnation_threshold"], "stagnation_threshold", limits.stagnationThreshold),
      oscillationCycles: parsePositiveInt(raw["oscillation_cycles"], "oscillation_cycles", limits.oscillationCycles),
    },
    timeouts: parseTimeouts(raw["timeouts"]),
    publish: parsePublish(raw["publish"]),
    compileErrorPatterns: parseCompilePatterns(raw["compile_error_patterns"]),
    build: {
      command: build["command"] === undefined
        ? [...DEFAULT_BUILD_COMMAND]
        : parseCommand(build["command"], "build.command"),
    },
    reports: {
      dashboard: parseCommand(reports["dashboard"], "reports.dashboard"),
      failures: parseCommand(reports["failures"], "reports.failures"),
      coverage: parseCommand(reports["coverage"], "reports.coverage"),
    },
    sources: { roots },
    generator: parseGenerator(raw["generator"]),
    ...(ledger ? { ledger } : {}),
  };
}
