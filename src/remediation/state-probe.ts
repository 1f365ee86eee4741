import { callWithTimeout } from "../core/effect-concurrency.js";
import type { Logger } from "../core/observability.js";
import { now } from "../types/index.js";
import type { CoverageGap, Snapshot } from "../types/index.js";
import type { BuildRunner, CoverageReporter, DashboardReader, FailureReporter } from "./collaborators.js";
import type { RunContext } from "./context.js";
import { CompileErrorSignature, extractCompileErrors } from "./diagnostics.js";
import { errorMessage, ProbeError } from "./errors.js";
import { describeMetrics, metricsOf } from "./targets.js";

export interface StateProbeCollaborators {
  build: BuildRunner;
  dashboard: DashboardReader;
  failures: FailureReporter;
  coverage: CoverageReporter;
}

const DEFAULT_SOURCE_ROOTS = ["src/main/java", "src/test/java"];

/**
 * Read-only view of build/test/coverage state. Every call is bounded by the
 * probe timeout; any failure to reach a collaborator is a ProbeError.
 */
export class StateProbe {
  private readonly signature: CompileErrorSignature;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(
    ctx: RunContext,
    private readonly collaborators: StateProbeCollaborators,
    private readonly sourceRoots: readonly string[] = DEFAULT_SOURCE_ROOTS,
  ) {
    this.signature = new CompileErrorSignature(ctx.settings.compileErrorPatterns);
    this.logger = ctx.logger("probe");
    this.timeoutMs = ctx.settings.timeouts.probeMs;
  }

  async probe(): Promise<Snapshot> {
    const build = await this.call("build", () => this.collaborators.build.run());

    if (build.kind === "failed" && this.signature.matches(build.diagnostic)) {
      // The dashboard describes the last build that compiled; it is stale now.
      const snapshot = freezeSnapshot({
        build,
        compileError: true,
        compileErrors: extractCompileErrors(build.diagnostic, this.sourceRoots),
        failures: [],
        gaps: [],
        probedAt: now(),
      });
      this.logger.info("Build does not compile", { errors: snapshot.compileErrors.length });
      return snapshot;
    }

    const dashboard = await this.call("dashboard", () => this.collaborators.dashboard.read());
    const { testSummary, coverageSummary } = dashboard;

    const failures = testSummary.failures > 0 || testSummary.errors > 0
      ? await this.call("failures", () => this.collaborators.failures.list())
      : [];
    const gaps = coverageSummary.linePercent < 100
      ? normalizeGaps(await this.call("coverage", () => this.collaborators.coverage.list()))
      : [];

    const snapshot = freezeSnapshot({
      build,
      compileError: false,
      compileErrors: [],
      dashboard,
      failures,
      gaps,
      probedAt: now(),
    });
    this.logger.info(`Probed: ${describeMetrics(metricsOf(snapshot))}`, {
      build: build.kind,
      failuresListed: failures.length,
      gapsListed: gaps.length,
    });
    return snapshot;
  }

  private call<A>(source: string, fn: () => Promise<A>): Promise<A> {
    return callWithTimeout(
      fn,
      this.timeoutMs,
      () => new ProbeError(source, `timed out after ${this.timeoutMs}ms`),
      (cause) => (cause instanceof ProbeError ? cause : new ProbeError(source, errorMessage(cause), cause)),
    );
  }
}

/** Sort and de-duplicate line numbers; drop classes with nothing uncovered. */
export function normalizeGaps(gaps: readonly CoverageGap[]): CoverageGap[] {
  const out: CoverageGap[] = [];
  for (const gap of gaps) {
    const lines = [...new Set(gap.uncoveredLines)].sort((a, b) => a - b);
    if (lines.length === 0) continue;
    out.push({ sourceClass: gap.sourceClass, uncoveredLines: lines });
  }
  return out;
}

function freezeSnapshot(snapshot: Snapshot): Snapshot {
  return Object.freeze({
    ...snapshot,
    compileErrors: Object.freeze([...snapshot.compileErrors]),
    failures: Object.freeze([...snapshot.failures]),
    gaps: Object.freeze([...snapshot.gaps]),
  });
}
