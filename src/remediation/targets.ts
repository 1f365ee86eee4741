import type {
  CompileErrorLocation,
  RemediationTarget,
  RemediationWorkflow,
  Snapshot,
  SnapshotMetrics,
  TestFailure,
} from "../types/index.js";

export function compileTargetKey(error: CompileErrorLocation): string {
  return `compile:${error.file ?? error.classFqn ?? "unknown"}:${error.line ?? 0}`;
}

export function testTargetKey(failure: Pick<TestFailure, "testClass" | "testMethod">): string {
  return `test:${failure.testClass}#${failure.testMethod}`;
}

export function coverageTargetKey(sourceClass: string, line: number): string {
  return `coverage:${sourceClass}:${line}`;
}

/**
 * Pick the single target a workflow addresses this pass: always the first
 * entry in reported order, so identical snapshots select identical targets.
 */
export function selectTarget(
  workflow: RemediationWorkflow,
  snapshot: Snapshot,
): RemediationTarget | null {
  switch (workflow) {
    case "FixCompileError": {
      const error = snapshot.compileErrors[0];
      return error ? { workflow, key: compileTargetKey(error), error } : null;
    }
    case "FixTestFailure": {
      const failure = snapshot.failures[0];
      return failure ? { workflow, key: testTargetKey(failure), failure } : null;
    }
    case "ImproveCoverage": {
      for (const gap of snapshot.gaps) {
        const line = gap.uncoveredLines[0];
        if (line === undefined) continue;
        return { workflow, key: coverageTargetKey(gap.sourceClass, line), sourceClass: gap.sourceClass, line };
      }
      return null;
    }
  }
}

export type TargetKind = "compile" | "test" | "coverage";

export function targetKind(key: string): TargetKind | null {
  const prefix = key.slice(0, key.indexOf(":"));
  return prefix === "compile" || prefix === "test" || prefix === "coverage" ? prefix : null;
}

export interface TargetObservation {
  /** Kinds whose presence this snapshot can speak for. */
  observable: ReadonlySet<TargetKind>;
  present: ReadonlySet<string>;
}

export function observeTargets(snapshot: Snapshot): TargetObservation {
  const present = new Set<string>();
  for (const error of snapshot.compileErrors) {
    present.add(compileTargetKey(error));
  }
  if (!snapshot.dashboard) {
    return { observable: new Set<TargetKind>(["compile"]), present };
  }
  for (const failure of snapshot.failures) {
    present.add(testTargetKey(failure));
  }
  for (const gap of snapshot.gaps) {
    for (const line of gap.uncoveredLines) {
      present.add(coverageTargetKey(gap.sourceClass, line));
    }
  }
  return { observable: new Set<TargetKind>(["compile", "test", "coverage"]), present };
}

export function metricsOf(snapshot: Snapshot): SnapshotMetrics {
  if (!snapshot.dashboard) return { compiles: false };
  const { testSummary, coverageSummary } = snapshot.dashboard;
  return {
    compiles: true,
    failures: testSummary.failures,
    errors: testSummary.errors,
    linePercent: coverageSummary.linePercent,
  };
}

export function sameMetrics(a: SnapshotMetrics, b: SnapshotMetrics): boolean {
  if (!a.compiles || !b.compiles) return a.compiles === b.compiles;
  return a.failures === b.failures && a.errors === b.errors && a.linePercent === b.linePercent;
}

export function describeMetrics(m: SnapshotMetrics): string {
  if (!m.compiles) return "does not compile";
  return `failures=${m.failures} errors=${m.errors} line=${m.linePercent}%`;
}
