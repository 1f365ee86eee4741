import type { LogLevel } from "../core/observability.js";
import type { RetryPolicyConfig } from "../remediation/retry-policy.js";

export type DurationString = string; // "200ms", "5m", "30s", "2h", "1h30m"

export interface GuardLimits {
  /** Passes allowed before more work is refused. */
  maxIterations: number;
  /** Consecutive applied passes without metric movement before halting. */
  stagnationThreshold: number;
  /** Reappearances of one target within an alternating run before halting. */
  oscillationCycles: number;
}

export interface Timeouts {
  probeMs: number;
  stepMs: number;
  generateMs: number;
  publishMs: number;
}

export interface PullRequestConfig {
  base: string;
  title: string;
  body?: string;
}

export interface PublishConfig {
  enabled: boolean;
  remote: string;
  pullRequest?: PullRequestConfig;
  retry: RetryPolicyConfig;
}

/** What the remediation loop itself needs; the rest of the config builds collaborators. */
export interface LoopSettings {
  limits: GuardLimits;
  timeouts: Timeouts;
  publish: PublishConfig;
  /** Regular expression sources matched case-insensitively against build diagnostics. */
  compileErrorPatterns: string[];
}

export type AgentWorker = "CLAUDE_CODE" | "CODEX_CLI" | "OPENCODE";

export type GeneratorConfig =
  | { worker: AgentWorker; model?: string }
  | { worker: "CUSTOM"; command: string[] };

export interface ReportCommands {
  dashboard: string[];
  failures: string[];
  coverage: string[];
}

export interface GreenloopConfig extends LoopSettings {
  workspace: string;
  logLevel: LogLevel;
  build: { command: string[] };
  reports: ReportCommands;
  sources: { roots: string[] };
  generator: GeneratorConfig;
  ledger?: { dir: string };
}
