import type { Snapshot, Workflow } from "../types/index.js";

/**
 * Choose the next workflow from a snapshot. First match wins:
 *
 *   1. the tree does not compile          → FixCompileError
 *   2. any test failure or error          → FixTestFailure
 *   3. line coverage below 100%           → ImproveCoverage
 *   4. otherwise                          → None
 *
 * A tree that does not compile invalidates every other signal, so rule 1 never
 * looks at the dashboard.
 */
export function decide(snapshot: Snapshot): Workflow {
  if (snapshot.build.kind === "failed" && snapshot.compileError) {
    return "FixCompileError";
  }
  const dashboard = snapshot.dashboard;
  if (!dashboard) {
    // No compile error but no dashboard either: nothing trustworthy to act on.
    return "None";
  }
  if (dashboard.testSummary.failures > 0 || dashboard.testSummary.errors > 0) {
    return "FixTestFailure";
  }
  if (dashboard.coverageSummary.linePercent < 100) {
    return "ImproveCoverage";
  }
  return "None";
}

/** True when the snapshot satisfies every terminal condition. */
export function meetsCompletion(snapshot: Snapshot): boolean {
  const dashboard = snapshot.dashboard;
  return (
    dashboard !== undefined &&
    dashboard.testSummary.failures === 0 &&
    dashboard.testSummary.errors === 0 &&
    dashboard.coverageSummary.linePercent === 100
  );
}
