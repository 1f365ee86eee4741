import type { LoopSettings } from "../config/types.js";
import type { Logger, MetricsCollector } from "../core/observability.js";
import { ObservabilityProvider } from "../core/observability.js";
import { generateId, now } from "../types/index.js";
import type { Timestamp, UUID } from "../types/index.js";

/**
 * Per-run state shared by the loop components. Created once per run and passed
 * explicitly; nothing in the loop keeps module-level state.
 */
export interface RunContext {
  readonly runId: UUID;
  readonly startedAt: Timestamp;
  readonly settings: LoopSettings;
  readonly observability: ObservabilityProvider;
  readonly metrics: MetricsCollector;
  logger(component: string): Logger;
}

export interface CreateRunContextOptions {
  settings: LoopSettings;
  observability?: ObservabilityProvider;
  runId?: UUID;
}

export function createRunContext(options: CreateRunContextOptions): RunContext {
  const observability = options.observability ?? new ObservabilityProvider("info");
  const runId = options.runId ?? generateId();
  return {
    runId,
    startedAt: now(),
    settings: options.settings,
    observability,
    metrics: observability.getMetrics(),
    logger: (component) => observability.createLogger(component, runId),
  };
}
