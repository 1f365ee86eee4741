import type { GuardLimits } from "../config/types.js";
import type { Logger } from "../core/observability.js";
import { now } from "../types/index.js";
import type {
  HaltReason,
  IterationRecord,
  PassOutcome,
  Snapshot,
  SnapshotMetrics,
  Workflow,
} from "../types/index.js";
import { describeMetrics, metricsOf, observeTargets, sameMetrics, targetKind } from "./targets.js";

export interface GuardHalt {
  reason: HaltReason;
  /** What tripped the check. */
  detail: string;
  /** `detail` followed by the history summary. */
  diagnostic: string;
}

export interface PassEntry {
  workflow: Workflow;
  target: string | null;
  outcome: PassOutcome;
  detail?: string;
  commitMessage?: string;
  metrics: SnapshotMetrics;
}

interface PresenceState {
  present: boolean;
  /** absent→present transitions inside the trailing alternating run. */
  reappearances: number;
}

/**
 * Owns the append-only pass history and decides when the loop must stop
 * making changes. `observe()` runs against every fresh snapshot before triage;
 * `checkCap()` runs after triage.
 */
export class ProgressGuard {
  private readonly records: IterationRecord[] = [];
  private readonly presence = new Map<string, PresenceState>();
  private stagnantPasses = 0;

  constructor(
    private readonly limits: GuardLimits,
    private readonly logger?: Logger,
  ) {}

  get passCount(): number {
    return this.records.length;
  }

  /** A copy; the guard's own history only grows through `record()`. */
  history(): readonly IterationRecord[] {
    return [...this.records];
  }

  record(entry: PassEntry): IterationRecord {
    const record: IterationRecord = Object.freeze({
      pass: this.records.length + 1,
      workflow: entry.workflow,
      target: entry.target,
      outcome: entry.outcome,
      ...(entry.detail !== undefined ? { detail: entry.detail } : {}),
      ...(entry.commitMessage !== undefined ? { commitMessage: entry.commitMessage } : {}),
      metrics: Object.freeze({ ...entry.metrics }),
      timestamp: now(),
    });
    this.records.push(record);
    this.logger?.debug(`Recorded pass ${record.pass}`, {
      workflow: record.workflow,
      target: record.target,
      outcome: record.outcome,
    });
    return record;
  }

  observe(snapshot: Snapshot): GuardHalt | null {
    const last = this.records[this.records.length - 1];
    const metrics = metricsOf(snapshot);
    const observation = observeTargets(snapshot);

    // Presence is tracked for every snapshot so oscillation sees the full run.
    const oscillating: string[] = [];
    for (const key of new Set([...this.presence.keys(), ...observation.present])) {
      const kind = targetKind(key);
      if (!kind || !observation.observable.has(kind)) continue;
      const present = observation.present.has(key);
      const state = this.presence.get(key);
      if (!state) {
        this.presence.set(key, { present, reappearances: 0 });
        continue;
      }
      if (state.present === present) {
        state.reappearances = 0;
      } else if (present) {
        state.reappearances += 1;
      }
      state.present = present;
      if (present && state.reappearances >= this.limits.oscillationCycles) {
        oscillating.push(key);
      }
    }

    if (last?.outcome === "applied") {
      this.stagnantPasses = sameMetrics(last.metrics, metrics) ? this.stagnantPasses + 1 : 0;
    }

    if (last?.outcome === "applied" && last.target !== null) {
      const kind = targetKind(last.target);
      if (kind && observation.observable.has(kind) && observation.present.has(last.target)) {
        return this.halt(
          "RegressionDetected",
          `target ${last.target} applied in pass ${last.pass} is still reported`,
        );
      }
    }

    if (oscillating.length > 0) {
      return this.halt(
        "OscillationDetected",
        `target ${oscillating.join(", ")} reappeared ${this.limits.oscillationCycles} times`,
      );
    }

    if (this.stagnantPasses >= this.limits.stagnationThreshold) {
      return this.halt(
        "StagnationDetected",
        `${this.stagnantPasses} applied passes left metrics at ${describeMetrics(metrics)}`,
      );
    }

    return null;
  }

  checkCap(decision: Workflow): GuardHalt | null {
    if (decision === "None" || this.records.length < this.limits.maxIterations) {
      return null;
    }
    return this.halt(
      "IterationCapExceeded",
      `${this.records.length} passes reached the cap of ${this.limits.maxIterations} with ${decision} still pending`,
    );
  }

  summary(): string {
    const counts: Record<PassOutcome, number> = { applied: 0, skipped: 0, failed: 0 };
    for (const record of this.records) {
      counts[record.outcome] += 1;
    }
    const lines = [
      `${this.records.length} passes (applied ${counts.applied}, skipped ${counts.skipped}, failed ${counts.failed})`,
    ];
    for (const record of this.records.slice(-5)) {
      lines.push(
        `  #${record.pass} ${record.workflow} ${record.target ?? "-"} ${record.outcome}` +
          ` [${describeMetrics(record.metrics)}]${record.detail ? `: ${record.detail}` : ""}`,
      );
    }
    return lines.join("\n");
  }

  private halt(reason: HaltReason, detail: string): GuardHalt {
    this.logger?.warn(`Halting: ${reason}`, { detail });
    return { reason, detail, diagnostic: `${reason}: ${detail}\n${this.summary()}` };
  }
}
