import { describe, test, expect } from "vitest";
import { ProbeError } from "../../../src/remediation/errors.js";
import { normalizeGaps, StateProbe } from "../../../src/remediation/state-probe.js";
import { FakeProject } from "../../helpers/fakes.js";
import {
  compileFailure,
  createDashboard,
  createFailure,
  createGap,
  createSettings,
  createTestContext,
} from "../../helpers/fixtures.js";

describe("StateProbe", () => {
  test("a compile error skips every report", async () => {
    const project = new FakeProject([
      {
        build: compileFailure("[ERROR] /w/src/main/java/com/acme/Calculator.java:[42,17] cannot find symbol"),
        dashboard: createDashboard({ failures: 5 }),
      },
    ]);
    const { ctx } = createTestContext(createSettings({ compileErrorPatterns: ["cannot find symbol"] }));
    const snapshot = await new StateProbe(ctx, project).probe();

    expect(project.calls).toEqual(["build"]);
    expect(snapshot.compileError).toBe(true);
    expect(snapshot.dashboard).toBeUndefined();
    expect(snapshot.compileErrors).toEqual([
      {
        file: "/w/src/main/java/com/acme/Calculator.java",
        classFqn: "com.acme.Calculator",
        line: 42,
        column: 17,
        message: "cannot find symbol",
      },
    ]);
  });

  test("a failed build without a compile signature still reads the dashboard", async () => {
    const project = new FakeProject([
      { build: { kind: "failed", diagnostic: "[ERROR] There are test failures." }, dashboard: createDashboard({ failures: 1 }), failures: [createFailure()] },
    ]);
    const { ctx } = createTestContext();
    const snapshot = await new StateProbe(ctx, project).probe();

    expect(snapshot.compileError).toBe(false);
    expect(snapshot.dashboard?.testSummary.failures).toBe(1);
    expect(snapshot.failures).toHaveLength(1);
  });

  test("fetches failures only when tests fail and gaps only below full coverage", async () => {
    const green = new FakeProject([{ dashboard: createDashboard() }]);
    const { ctx } = createTestContext();
    await new StateProbe(ctx, green).probe();
    expect(green.calls).toEqual(["build", "dashboard"]);

    const red = new FakeProject([
      { dashboard: createDashboard({ errors: 1, linePercent: 80 }), failures: [createFailure()], gaps: [createGap()] },
    ]);
    const snapshot = await new StateProbe(ctx, red).probe();
    expect(red.calls).toEqual(["build", "dashboard", "failures", "coverage"]);
    expect(snapshot.gaps).toEqual([createGap()]);
  });

  test("snapshots are frozen copies", async () => {
    const failures = [createFailure()];
    const project = new FakeProject([{ dashboard: createDashboard({ failures: 1 }), failures }]);
    const { ctx } = createTestContext();
    const snapshot = await new StateProbe(ctx, project).probe();

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.failures)).toBe(true);
    expect(snapshot.failures).not.toBe(failures);
    failures.push(createFailure("com.acme.OtherTest", "late"));
    expect(snapshot.failures).toHaveLength(1);
  });

  test("a rejecting collaborator is a ProbeError naming its source", async () => {
    const project = new FakeProject([{ dashboard: createDashboard() }]);
    const { ctx } = createTestContext();
    const probe = new StateProbe(ctx, {
      build: project.build,
      failures: project.failures,
      coverage: project.coverage,
      dashboard: { read: () => Promise.reject(new Error("connection refused")) },
    });

    const err = await probe.probe().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProbeError);
    if (!(err instanceof ProbeError)) return;
    expect(err.source).toBe("dashboard");
    expect(err.message).toBe("probe failed (dashboard): connection refused");
  });

  test("a collaborator that outlives the probe timeout is a ProbeError", async () => {
    const project = new FakeProject([{}]);
    const { ctx } = createTestContext(
      createSettings({ timeouts: { probeMs: 20, stepMs: 1000, generateMs: 1000, publishMs: 1000 } }),
    );
    const probe = new StateProbe(ctx, {
      build: { run: () => new Promise(() => undefined) },
      dashboard: project.dashboard,
      failures: project.failures,
      coverage: project.coverage,
    });

    await expect(probe.probe()).rejects.toThrow("probe failed (build): timed out after 20ms");
  });
});

describe("normalizeGaps", () => {
  test("sorts, de-duplicates and drops empty gaps", () => {
    expect(
      normalizeGaps([
        { sourceClass: "a.B", uncoveredLines: [9, 3, 9, 4] },
        { sourceClass: "a.C", uncoveredLines: [] },
      ]),
    ).toEqual([{ sourceClass: "a.B", uncoveredLines: [3, 4, 9] }]);
  });
});
