/**
 * greenloop CLI: drives a Maven project to green tests and full line coverage.
 *
 *   greenloop run [options]
 */
import path from "node:path";
import { createCollaborators } from "./adapters/index.js";
import { DEFAULT_CONFIG_FILE, loadConfig, type ConfigOverrides } from "./config/loader.js";
import { ConfigParseError } from "./config/parser.js";
import type { GreenloopConfig } from "./config/types.js";
import { isLogLevel, LOG_LEVELS, ObservabilityProvider, stderrSink, type LogSink } from "./core/observability.js";
import type { Collaborators } from "./remediation/collaborators.js";
import { createRunContext } from "./remediation/context.js";
import { HistoryLedger } from "./remediation/history-ledger.js";
import { describeTermination, RemediationLoop } from "./remediation/loop.js";
import type { LoopTermination } from "./types/index.js";

// ── Argument parsing ──────────────────────────────────────────────

export interface RunOptions {
  configPath: string;
  overrides: ConfigOverrides;
}

export type CliCommand =
  | { command: "help" }
  | { command: "version" }
  | { command: "run"; options: RunOptions };

export const HELP_TEXT = `
greenloop: autonomous build, test and coverage remediation

USAGE
  greenloop run [options]

OPTIONS
  --config <file>               Config file                            (default: ${DEFAULT_CONFIG_FILE})
  --workspace <dir>             Project directory (overrides config)
  --max-iterations <n>          Pass cap                               (default: 50)
  --stagnation-threshold <n>    Applied passes without metric movement (default: 3)
  --no-publish                  Verify completion but do not push
  --log-level <level>           debug|info|warn|error|fatal            (default: info)

  --help, -h                    Show this help message
  --version, -v                 Show version

ENVIRONMENT
  GREENLOOP_MAX_ITERATIONS, GREENLOOP_LOG_LEVEL, GREENLOOP_WORKSPACE

EXIT CODES
  0  success       2  blocked by a guard or unmet preconditions
  1  aborted, or invalid usage
`.trim();

export const VERSION = "0.1.0";

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [first, ...rest] = argv;
  if (first === undefined || first === "--help" || first === "-h") return { command: "help" };
  if (first === "--version" || first === "-v") return { command: "version" };
  if (first !== "run") {
    throw new CliUsageError(`unknown command "${first}"\nRun 'greenloop --help' for usage.`);
  }

  const options: RunOptions = { configPath: DEFAULT_CONFIG_FILE, overrides: {} };
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    const next = (): string => {
      i++;
      const val = rest[i];
      if (val === undefined) throw new CliUsageError(`${arg} requires a value`);
      return val;
    };
    const nextInt = (): number => {
      const raw = next();
      const v = Number(raw);
      if (!Number.isInteger(v) || v < 1) throw new CliUsageError(`${arg} requires a positive integer (got "${raw}")`);
      return v;
    };

    switch (arg) {
      case "--help": case "-h": return { command: "help" };
      case "--version": case "-v": return { command: "version" };
      case "--config": options.configPath = next(); break;
      case "--workspace": options.overrides.workspace = next(); break;
      case "--max-iterations": options.overrides.maxIterations = nextInt(); break;
      case "--stagnation-threshold": options.overrides.stagnationThreshold = nextInt(); break;
      case "--no-publish": options.overrides.publish = false; break;
      case "--log-level": {
        const level = next();
        if (!isLogLevel(level)) {
          throw new CliUsageError(`invalid log level "${level}". Must be one of: ${LOG_LEVELS.join(", ")}`);
        }
        options.overrides.logLevel = level;
        break;
      }
      default:
        throw new CliUsageError(`unknown option "${arg}"\nRun 'greenloop --help' for usage.`);
    }
  }
  return { command: "run", options };
}

// ── Execution ─────────────────────────────────────────────────────

export function exitCodeFor(termination: LoopTermination): number {
  if (termination.state === "aborted") return 1;
  return termination.status === "success" ? 0 : 2;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  out?: (text: string) => void;
  sink?: LogSink;
  signal?: AbortSignal;
  collaborators?: (config: GreenloopConfig) => Collaborators;
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const out = deps.out ?? ((text: string) => process.stdout.write(text + "\n"));
  const err = (text: string) => process.stderr.write(`Error: ${text}\n`);

  let parsed: CliCommand;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    if (e instanceof CliUsageError) {
      err(e.message);
      return 1;
    }
    throw e;
  }

  if (parsed.command === "help") {
    out(HELP_TEXT);
    return 0;
  }
  if (parsed.command === "version") {
    out(VERSION);
    return 0;
  }

  let config: GreenloopConfig;
  try {
    config = await loadConfig(parsed.options.configPath, parsed.options.overrides, deps.env ?? process.env);
  } catch (e) {
    if (e instanceof ConfigParseError) {
      err(e.message);
      return 1;
    }
    throw e;
  }

  const observability = new ObservabilityProvider(config.logLevel, deps.sink ?? stderrSink);
  const ctx = createRunContext({ settings: config, observability });
  const logger = ctx.logger("cli");
  logger.info(`greenloop ${VERSION}`, { workspace: config.workspace, config: parsed.options.configPath });

  const collaborators = deps.collaborators
    ? deps.collaborators(config)
    : createCollaborators(config, config.workspace);
  const ledger = config.ledger
    ? new HistoryLedger(path.resolve(config.workspace, config.ledger.dir))
    : undefined;

  const loop = new RemediationLoop(ctx, collaborators, {
    ...(deps.signal ? { signal: deps.signal } : {}),
    ...(ledger ? { ledger } : {}),
    sourceRoots: config.sources.roots,
  });
  const result = await loop.run();

  out(describeTermination(result.termination));
  if (result.termination.state === "terminated" && result.termination.status === "blocked") {
    out(result.termination.diagnostic);
  }
  return exitCodeFor(result.termination);
}

/** Process entry: wires signals to cancellation and exits with the run's code. */
export async function main(argv: readonly string[]): Promise<never> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    process.stderr.write(`\nReceived ${signal}, stopping after the current pass...\n`);
    controller.abort(signal);
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const code = await runCli(argv, { signal: controller.signal });
    process.exit(code);
  } catch (e) {
    const msg = e instanceof Error ? e.stack ?? e.message : String(e);
    process.stderr.write(`Fatal: ${msg}\n`);
    process.exit(1);
  }
}
