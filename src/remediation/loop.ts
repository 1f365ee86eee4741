import { formatDuration } from "../config/duration.js";
import { callWithTimeout } from "../core/effect-concurrency.js";
import type { Logger, MetricEntry } from "../core/observability.js";
import type {
  AbortReason,
  IterationRecord,
  LoopTermination,
  RepositoryState,
  SnapshotMetrics,
  Workflow,
} from "../types/index.js";
import type { Collaborators } from "./collaborators.js";
import { CompletionGate } from "./completion-gate.js";
import type { RunContext } from "./context.js";
import {
  ApplyError,
  errorMessage,
  ProbeError,
  PublishError,
  StepTimeoutError,
  VersionControlError,
} from "./errors.js";
import { WorkflowExecutor } from "./executor.js";
import type { HistoryLedger } from "./history-ledger.js";
import { ProgressGuard, type GuardHalt, type PassEntry } from "./progress-guard.js";
import { StateProbe } from "./state-probe.js";
import { metricsOf } from "./targets.js";
import { decide } from "./triage.js";

export interface RemediationLoopOptions {
  /** Checked between passes; a pass in flight always completes. */
  signal?: AbortSignal;
  ledger?: HistoryLedger;
  sourceRoots?: readonly string[];
  /** Jitter source for publication retries. */
  random?: () => number;
}

export interface LoopResult {
  termination: LoopTermination;
  history: readonly IterationRecord[];
  metrics: MetricEntry[];
}

/**
 * Probe → guard → triage → cap → execute (or complete), one workflow per
 * pass, until the gate terminates the run, a guard halts it, or an error
 * aborts it.
 */
export class RemediationLoop {
  private readonly logger: Logger;
  private readonly probe: StateProbe;
  private readonly executor: WorkflowExecutor;
  private readonly guard: ProgressGuard;
  private readonly gate: CompletionGate;

  constructor(
    private readonly ctx: RunContext,
    private readonly collaborators: Collaborators,
    private readonly options: RemediationLoopOptions = {},
  ) {
    this.logger = ctx.logger("loop");
    this.probe = new StateProbe(ctx, collaborators, options.sourceRoots);
    this.executor = new WorkflowExecutor(ctx, collaborators);
    this.guard = new ProgressGuard(ctx.settings.limits, ctx.logger("guard"));
    this.gate = new CompletionGate(ctx, collaborators.vcs, options.random);
  }

  async run(): Promise<LoopResult> {
    const { limits, timeouts } = this.ctx.settings;
    this.logger.info("Remediation run started", {
      maxIterations: limits.maxIterations,
      stagnationThreshold: limits.stagnationThreshold,
      oscillationCycles: limits.oscillationCycles,
      publish: this.ctx.settings.publish.enabled,
      probeTimeout: formatDuration(timeouts.probeMs),
      generateTimeout: formatDuration(timeouts.generateMs),
    });

    let termination: LoopTermination;
    try {
      termination = await this.drive();
    } catch (err) {
      termination = classifyAbort(err);
    }

    if (this.options.ledger) {
      try {
        await this.options.ledger.writeTermination(this.ctx.runId, this.guard.passCount, termination);
      } catch (err) {
        this.logger.error(`Failed to write termination to ledger: ${errorMessage(err)}`);
      }
    }

    const summary = describeTermination(termination);
    if (termination.state === "terminated" && termination.status === "success") {
      this.logger.info(summary, { passes: this.guard.passCount });
    } else {
      this.logger.error(summary, { passes: this.guard.passCount });
    }

    return {
      termination,
      history: this.guard.history(),
      metrics: this.ctx.metrics.getMetrics(),
    };
  }

  private async drive(): Promise<LoopTermination> {
    const repository = await callWithTimeout<RepositoryState, Error>(
      () => this.collaborators.vcs.status(),
      this.ctx.settings.timeouts.stepMs,
      () => new StepTimeoutError("status", this.ctx.settings.timeouts.stepMs),
      (cause) => new VersionControlError("status", errorMessage(cause), cause),
    );
    if (!repository.clean) {
      return {
        state: "aborted",
        reason: "InconsistentState",
        message: "working tree has uncommitted changes at startup",
      };
    }

    for (;;) {
      if (this.options.signal?.aborted) {
        return { state: "aborted", reason: "Cancelled", message: `cancelled after ${this.guard.passCount} passes` };
      }

      const snapshot = await this.probe.probe();
      const metrics = metricsOf(snapshot);
      if (metrics.compiles) {
        this.ctx.metrics.gauge("line_coverage_percent", metrics.linePercent);
        this.ctx.metrics.gauge("test_failures", metrics.failures + metrics.errors);
      }

      const halt = this.guard.observe(snapshot);
      if (halt) return this.halt("None", halt, metrics);

      const decision = decide(snapshot);
      this.logger.info(`Pass ${this.guard.passCount + 1}: ${decision}`);

      const capHalt = this.guard.checkCap(decision);
      if (capHalt) return this.halt(decision, capHalt, metrics);

      if (decision === "None") {
        let termination: LoopTermination;
        try {
          termination = await this.gate.complete(snapshot);
        } catch (err) {
          termination = classifyAbort(err);
        }
        await this.record({
          workflow: "None",
          target: null,
          outcome: "skipped",
          detail: describeTermination(termination),
          metrics,
        });
        return termination;
      }

      const result = await this.executor.execute(decision, snapshot);
      await this.record({
        workflow: result.workflow,
        target: result.target,
        outcome: result.outcome,
        ...(result.detail !== undefined ? { detail: result.detail } : {}),
        ...(result.commitMessage !== undefined ? { commitMessage: result.commitMessage } : {}),
        metrics,
      });
      if (result.fatal) throw result.fatal;
    }
  }

  /** The halting pass probed but ran nothing; it is still recorded. */
  private async halt(workflow: Workflow, halt: GuardHalt, metrics: SnapshotMetrics): Promise<LoopTermination> {
    await this.record({
      workflow,
      target: null,
      outcome: "skipped",
      detail: halt.diagnostic.split("\n")[0] ?? halt.reason,
      metrics,
    });
    return blocked(halt);
  }

  private async record(entry: PassEntry): Promise<void> {
    const record = this.guard.record(entry);
    this.ctx.metrics.counter("passes_total", 1, { workflow: record.workflow, outcome: record.outcome });
    if (!this.options.ledger) return;
    try {
      await this.options.ledger.append(this.ctx.runId, record);
    } catch (err) {
      this.logger.error(`Failed to append pass ${record.pass} to ledger: ${errorMessage(err)}`);
    }
  }
}

function blocked(halt: GuardHalt): LoopTermination {
  return { state: "terminated", status: "blocked", reason: halt.reason, diagnostic: halt.diagnostic };
}

/** Map a loop-ending error onto its abort reason. Unknown errors propagate. */
export function classifyAbort(err: unknown): LoopTermination {
  const abort = (reason: AbortReason, error: Error): LoopTermination => ({
    state: "aborted",
    reason,
    message: error.message,
    error,
  });
  if (err instanceof ProbeError) return abort("ProbeError", err);
  if (err instanceof ApplyError) return abort("ApplyError", err);
  if (err instanceof VersionControlError) return abort("VersionControlError", err);
  if (err instanceof StepTimeoutError) return abort("StepTimeout", err);
  if (err instanceof PublishError) return abort("PublishError", err);
  throw err;
}

export function describeTermination(termination: LoopTermination): string {
  if (termination.state === "aborted") {
    return `aborted (${termination.reason}): ${termination.message}`;
  }
  if (termination.status === "blocked") {
    return `blocked (${termination.reason}): ${termination.diagnostic.split("\n")[0] ?? ""}`;
  }
  if (!termination.published) return "success (not published)";
  return termination.requestUrl ? `success, published ${termination.requestUrl}` : "success, published";
}
