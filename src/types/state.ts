import type { Timestamp } from "./common.js";

// ---------------------------------------------------------------------------
// Build / report state
// ---------------------------------------------------------------------------

export type BuildStatus =
  | { kind: "ok" }
  | { kind: "failed"; diagnostic: string };

export interface TestSummary {
  total: number;
  failures: number;
  errors: number;
  skipped: number;
  passed: number;
}

export interface CoverageSummary {
  linePercent: number;
  branchPercent: number;
  methodPercent: number;
}

export interface QualityDashboard {
  testSummary: TestSummary;
  coverageSummary: CoverageSummary;
}

export interface TestFailure {
  testClass: string;
  testMethod: string;
  kind: "failure" | "error";
  message: string;
  stackTrace: string;
}

export interface CoverageGap {
  sourceClass: string;
  /** Ascending, without duplicates. */
  uncoveredLines: number[];
}

export interface CompileErrorLocation {
  /** Path as printed by the compiler (absolute or workspace-relative). */
  file?: string;
  classFqn?: string;
  line?: number;
  column?: number;
  message: string;
}

export interface Snapshot {
  readonly build: BuildStatus;
  readonly compileError: boolean;
  readonly compileErrors: readonly CompileErrorLocation[];
  /** Absent while the tree does not compile. */
  readonly dashboard?: QualityDashboard;
  readonly failures: readonly TestFailure[];
  readonly gaps: readonly CoverageGap[];
  readonly probedAt: Timestamp;
}

export interface RepositoryState {
  clean: boolean;
}

// ---------------------------------------------------------------------------
// Workflows and targets
// ---------------------------------------------------------------------------

export type Workflow = "FixCompileError" | "FixTestFailure" | "ImproveCoverage" | "None";

export type RemediationWorkflow = Exclude<Workflow, "None">;

export type RemediationTarget =
  | { workflow: "FixCompileError"; key: string; error: CompileErrorLocation }
  | { workflow: "FixTestFailure"; key: string; failure: TestFailure }
  | { workflow: "ImproveCoverage"; key: string; sourceClass: string; line: number };

export type PassOutcome = "applied" | "skipped" | "failed";

/**
 * Metric fingerprint of a snapshot. `compiles: false` snapshots carry no
 * dashboard numbers.
 */
export type SnapshotMetrics =
  | { compiles: false }
  | { compiles: true; failures: number; errors: number; linePercent: number };

export interface IterationRecord {
  readonly pass: number;
  readonly workflow: Workflow;
  readonly target: string | null;
  readonly outcome: PassOutcome;
  readonly detail?: string;
  readonly commitMessage?: string;
  /** Metrics of the snapshot the pass was triaged from. */
  readonly metrics: SnapshotMetrics;
  readonly timestamp: Timestamp;
}

// ---------------------------------------------------------------------------
// Termination
// ---------------------------------------------------------------------------

export type HaltReason =
  | "RegressionDetected"
  | "OscillationDetected"
  | "StagnationDetected"
  | "IterationCapExceeded";

export type AbortReason =
  | "ProbeError"
  | "ApplyError"
  | "VersionControlError"
  | "StepTimeout"
  | "PublishError"
  | "InconsistentState"
  | "Cancelled";

export type LoopTermination =
  | { state: "terminated"; status: "success"; published: boolean; requestUrl?: string }
  | { state: "terminated"; status: "blocked"; reason: HaltReason | "PreconditionsUnmet"; diagnostic: string }
  | { state: "aborted"; reason: AbortReason; message: string; error?: Error };
