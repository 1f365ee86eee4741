import type { LoopSettings } from "../../src/config/types.js";
import { ObservabilityProvider, type LogEntry } from "../../src/core/observability.js";
import { createRunContext, type RunContext } from "../../src/remediation/context.js";
import type {
  BuildStatus,
  CoverageGap,
  QualityDashboard,
  Snapshot,
  TestFailure,
} from "../../src/types/index.js";

export const TEST_RUN_ID = "00000000-0000-4000-a000-000000000001";

export const OK_BUILD: BuildStatus = { kind: "ok" };

export function compileFailure(diagnostic = "[ERROR] COMPILATION ERROR"): BuildStatus {
  return { kind: "failed", diagnostic };
}

export function createDashboard(
  metrics: { failures?: number; errors?: number; linePercent?: number; total?: number } = {},
): QualityDashboard {
  const failures = metrics.failures ?? 0;
  const errors = metrics.errors ?? 0;
  const total = metrics.total ?? 10;
  return {
    testSummary: { total, failures, errors, skipped: 0, passed: total - failures - errors },
    coverageSummary: { linePercent: metrics.linePercent ?? 100, branchPercent: 90, methodPercent: 95 },
  };
}

export function createFailure(
  testClass = "com.acme.CalculatorTest",
  testMethod = "addsNumbers",
  overrides: Partial<TestFailure> = {},
): TestFailure {
  return {
    testClass,
    testMethod,
    kind: "failure",
    message: "expected: <4> but was: <5>",
    stackTrace: `org.opentest4j.AssertionFailedError: expected: <4> but was: <5>\n\tat ${testClass}.${testMethod}(${testClass.split(".").pop() ?? testClass}.java:12)`,
    ...overrides,
  };
}

export function createGap(sourceClass = "com.acme.Calculator", uncoveredLines: number[] = [17, 18]): CoverageGap {
  return { sourceClass, uncoveredLines };
}

/** A green snapshot unless overridden. */
export function createSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    build: OK_BUILD,
    compileError: false,
    compileErrors: [],
    dashboard: createDashboard(),
    failures: [],
    gaps: [],
    probedAt: 1_700_000_000_000,
    ...overrides,
  };
}

export function createSettings(overrides: Partial<LoopSettings> = {}): LoopSettings {
  return {
    limits: { maxIterations: 10, stagnationThreshold: 3, oscillationCycles: 2 },
    timeouts: { probeMs: 2000, stepMs: 2000, generateMs: 2000, publishMs: 2000 },
    publish: {
      enabled: true,
      remote: "origin",
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 2 },
    },
    compileErrorPatterns: ["COMPILATION ERROR", "compil(?:e|ation) error", "cannot find symbol"],
    ...overrides,
  };
}

export interface TestContext {
  ctx: RunContext;
  logs: LogEntry[];
}

export function createTestContext(settings: LoopSettings = createSettings()): TestContext {
  const logs: LogEntry[] = [];
  const observability = new ObservabilityProvider("debug", (entry) => logs.push(entry));
  const ctx = createRunContext({ settings, observability, runId: TEST_RUN_ID });
  return { ctx, logs };
}
