export * from "./types/index.js";
export { ObservabilityProvider, Logger, MetricsCollector, stderrSink } from "./core/observability.js";
export type { LogEntry, LogLevel, LogSink, MetricEntry } from "./core/observability.js";
export * from "./config/types.js";
export { parseConfig, ConfigParseError, DEFAULT_LOOP_SETTINGS, DEFAULT_COMPILE_ERROR_PATTERNS } from "./config/parser.js";
export { loadConfig, loadConfigFile, applyOverrides, envOverrides } from "./config/loader.js";
export type { ConfigOverrides } from "./config/loader.js";
export { parseDuration, formatDuration } from "./config/duration.js";
export type * from "./remediation/collaborators.js";
export * from "./remediation/errors.js";
export { createRunContext } from "./remediation/context.js";
export type { RunContext } from "./remediation/context.js";
export { StateProbe } from "./remediation/state-probe.js";
export { decide, meetsCompletion } from "./remediation/triage.js";
export { WorkflowExecutor } from "./remediation/executor.js";
export type { PassResult } from "./remediation/executor.js";
export { ProgressGuard } from "./remediation/progress-guard.js";
export type { GuardHalt } from "./remediation/progress-guard.js";
export { CompletionGate } from "./remediation/completion-gate.js";
export { HistoryLedger } from "./remediation/history-ledger.js";
export { RemediationLoop, describeTermination } from "./remediation/loop.js";
export type { LoopResult, RemediationLoopOptions } from "./remediation/loop.js";
export { createCollaborators } from "./adapters/index.js";
