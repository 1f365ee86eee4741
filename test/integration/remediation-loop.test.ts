import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, describe, test, expect } from "vitest";
import { HistoryLedger } from "../../src/remediation/history-ledger.js";
import { RemediationLoop } from "../../src/remediation/loop.js";
import {
  CALCULATOR_CLASSES,
  CALCULATOR_FILES,
  createFakeCollaborators,
  type PatchFn,
  type ProjectState,
} from "../helpers/fakes.js";
import {
  compileFailure,
  createDashboard,
  createFailure,
  createGap,
  createSettings,
  createTestContext,
} from "../helpers/fixtures.js";

const SOURCE = "src/main/java/com/acme/Calculator.java";
const GREEN: ProjectState = { dashboard: createDashboard() };

function failingState(...methods: string[]): ProjectState {
  return {
    dashboard: createDashboard({ failures: methods.length }),
    failures: methods.map((m) => createFailure("com.acme.CalculatorTest", m)),
  };
}

function setup(states: ProjectState[], settings = createSettings(), patch?: PatchFn) {
  const { ctx, logs } = createTestContext(settings);
  const fakes = createFakeCollaborators({
    states,
    classes: CALCULATOR_CLASSES,
    files: CALCULATOR_FILES,
    ...(patch ? { patch } : {}),
  });
  return { ctx, logs, fakes };
}

describe("RemediationLoop", () => {
  const tempDirs: string[] = [];

  afterEach(async () => {
    for (const dir of tempDirs.splice(0)) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("fixes one failing test per pass and publishes once green", async () => {
    const { ctx, fakes } = setup([
      {
        dashboard: createDashboard({ failures: 3, linePercent: 87.2 }),
        failures: [
          createFailure("com.acme.CalculatorTest", "addsNumbers"),
          createFailure("com.acme.CalculatorTest", "subtractsNumbers"),
          createFailure("com.acme.ParserTest", "parsesDigits"),
        ],
        gaps: [createGap()],
      },
      GREEN,
    ]);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(result.termination).toEqual({ state: "terminated", status: "success", published: true });
    expect(fakes.generatorFake.requests.map((r) => r.target.key)).toEqual([
      "test:com.acme.CalculatorTest#addsNumbers",
    ]);
    expect(fakes.vcsFake.commits).toEqual([
      "fix(test): make com.acme.CalculatorTest#addsNumbers pass\n\n" +
        "failure: expected: <4> but was: <5>\n\n" +
        "Remediation-Target: test:com.acme.CalculatorTest#addsNumbers",
    ]);
    expect(fakes.vcsFake.calls).toEqual(["status", "stageAll", "commit", "status", "push"]);

    expect(result.history.map((r) => [r.pass, r.workflow, r.target, r.outcome])).toEqual([
      [1, "FixTestFailure", "test:com.acme.CalculatorTest#addsNumbers", "applied"],
      [2, "None", null, "skipped"],
    ]);
    expect(result.history[1]?.detail).toBe("success, published");
    expect(ctx.metrics.value("passes_total", { workflow: "FixTestFailure", outcome: "applied" })).toBe(1);
    expect(ctx.metrics.value("line_coverage_percent")).toBe(100);
  });

  test("a green clean tree terminates immediately with publication", async () => {
    const { ctx, fakes } = setup([GREEN]);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(result.termination).toEqual({ state: "terminated", status: "success", published: true });
    expect(fakes.vcsFake.pushes).toBe(1);
    expect(fakes.generatorFake.requests).toEqual([]);
    expect(result.history).toHaveLength(1);
  });

  test("halts when the applied target still fails on the next probe", async () => {
    const { ctx, fakes } = setup([failingState("addsNumbers"), failingState("addsNumbers")]);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(result.termination.state).toBe("terminated");
    if (result.termination.state !== "terminated" || result.termination.status !== "blocked") {
      throw new Error("expected a blocked termination");
    }
    expect(result.termination.reason).toBe("RegressionDetected");
    expect(result.termination.diagnostic.split("\n")[0]).toBe(
      "RegressionDetected: target test:com.acme.CalculatorTest#addsNumbers applied in pass 1 is still reported",
    );
    expect(result.history.map((r) => [r.pass, r.workflow, r.target, r.outcome])).toEqual([
      [1, "FixTestFailure", "test:com.acme.CalculatorTest#addsNumbers", "applied"],
      [2, "None", null, "skipped"],
    ]);
    expect(result.history[1]?.detail).toBe(
      "RegressionDetected: target test:com.acme.CalculatorTest#addsNumbers applied in pass 1 is still reported",
    );
    expect(fakes.vcsFake.pushes).toBe(0);
    expect(fakes.vcsFake.calls).not.toContain("push");
  });

  test("a compile error outranks failing tests", async () => {
    const { ctx, fakes } = setup([
      { build: compileFailure("compile error at line 42"), ...failingState("a", "b", "c", "d", "e") },
      GREEN,
    ]);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(result.history[0]).toMatchObject({
      pass: 1,
      workflow: "FixCompileError",
      target: "compile:unknown:42",
      outcome: "failed",
      detail: "LocateError: build diagnostic names no source file",
    });
    // Pass 1 never read the reports.
    expect(fakes.project.calls).toEqual(["build", "build", "dashboard"]);
    expect(result.termination).toEqual({ state: "terminated", status: "success", published: true });
  });

  test("fixes a located compile error", async () => {
    const diagnostic = [
      "[ERROR] COMPILATION ERROR :",
      "[ERROR] /work/calc/src/main/java/com/acme/Calculator.java:[42,9] cannot find symbol",
    ].join("\n");
    const { ctx, fakes } = setup([{ build: compileFailure(diagnostic) }, GREEN]);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(fakes.store.writes.map((w) => w.path)).toEqual([SOURCE]);
    expect(fakes.vcsFake.commits[0]).toBe(
      "fix(build): resolve compile error in Calculator.java:42\n\n" +
        "cannot find symbol\n\n" +
        "Remediation-Target: compile:/work/calc/src/main/java/com/acme/Calculator.java:42",
    );
    expect(result.termination).toEqual({ state: "terminated", status: "success", published: true });
  });

  test("halts after applied passes that never move the metrics", async () => {
    const { ctx, fakes } = setup([
      failingState("first"),
      failingState("second"),
      failingState("third"),
      failingState("fourth"),
    ]);

    const result = await new RemediationLoop(ctx, fakes).run();

    if (result.termination.state !== "terminated" || result.termination.status !== "blocked") {
      throw new Error("expected a blocked termination");
    }
    expect(result.termination.reason).toBe("StagnationDetected");
    expect(result.termination.diagnostic.split("\n")[0]).toBe(
      "StagnationDetected: 3 applied passes left metrics at failures=1 errors=0 line=100%",
    );
    expect(fakes.vcsFake.commits).toHaveLength(3);
    expect(result.history.map((r) => r.outcome)).toEqual(["applied", "applied", "applied", "skipped"]);
    expect(result.history[3]).toMatchObject({
      pass: 4,
      workflow: "None",
      target: null,
      detail: "StagnationDetected: 3 applied passes left metrics at failures=1 errors=0 line=100%",
    });
  });

  test("stops at the iteration cap", async () => {
    const settings = createSettings({
      limits: { maxIterations: 2, stagnationThreshold: 10, oscillationCycles: 2 },
    });
    const { ctx, fakes } = setup([failingState("first"), failingState("second"), failingState("third")], settings);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(result.termination).toMatchObject({
      state: "terminated",
      status: "blocked",
      reason: "IterationCapExceeded",
    });
    expect(result.history).toHaveLength(3);
    expect(result.history[2]).toMatchObject({
      pass: 3,
      workflow: "FixTestFailure",
      target: null,
      outcome: "skipped",
      detail: "IterationCapExceeded: 2 passes reached the cap of 2 with FixTestFailure still pending",
    });
    expect(fakes.project.buildCount).toBe(3);
    expect(fakes.vcsFake.commits).toHaveLength(2);
  });

  test("works through coverage gaps after the tests pass", async () => {
    const { ctx, fakes } = setup([
      { dashboard: createDashboard({ linePercent: 90 }), gaps: [createGap("com.acme.Calculator", [17])] },
      GREEN,
    ]);

    const result = await new RemediationLoop(ctx, fakes).run();

    expect(fakes.store.writes.map((w) => w.path)).toEqual(["src/test/java/com/acme/CalculatorTest.java"]);
    expect(result.history[0]?.target).toBe("coverage:com.acme.Calculator:17");
    expect(result.termination.state).toBe("terminated");
  });

  describe("aborts", () => {
    test("refuses to start from a dirty tree", async () => {
      const { ctx, fakes } = setup([GREEN]);
      fakes.vcsFake.clean = false;

      const result = await new RemediationLoop(ctx, fakes).run();

      expect(result.termination).toEqual({
        state: "aborted",
        reason: "InconsistentState",
        message: "working tree has uncommitted changes at startup",
      });
      expect(fakes.project.buildCount).toBe(0);
    });

    test("a rejected write ends the run after recording the pass", async () => {
      const { ctx, fakes } = setup([failingState("addsNumbers")]);
      fakes.store.failWrites = true;

      const result = await new RemediationLoop(ctx, fakes).run();

      expect(result.termination).toMatchObject({
        state: "aborted",
        reason: "ApplyError",
        message: `write rejected for ${SOURCE}: EACCES: permission denied, open '${SOURCE}'`,
      });
      expect(result.history).toHaveLength(1);
      expect(result.history[0]?.outcome).toBe("failed");
      expect(fakes.vcsFake.commits).toEqual([]);
    });

    test("a failing build harness is a probe error", async () => {
      const { ctx, fakes } = setup([GREEN]);
      fakes.build = {
        run: async () => {
          throw new Error("mvn: command not found");
        },
      };

      const result = await new RemediationLoop(ctx, fakes).run();

      expect(result.termination).toMatchObject({
        state: "aborted",
        reason: "ProbeError",
        message: "probe failed (build): mvn: command not found",
      });
    });

    test("cancellation takes effect between passes", async () => {
      const controller = new AbortController();
      const { ctx, fakes } = setup([failingState("addsNumbers"), GREEN], createSettings(), (req) => {
        controller.abort();
        return `${req.file.content}// fixed\n`;
      });

      const result = await new RemediationLoop(ctx, fakes, { signal: controller.signal }).run();

      expect(result.termination).toEqual({
        state: "aborted",
        reason: "Cancelled",
        message: "cancelled after 1 passes",
      });
      expect(fakes.vcsFake.commits).toHaveLength(1);
    });
  });

  test("writes the pass history and outcome to the ledger", async () => {
    const dir = await mkdtemp(path.join(tmpdir(), "greenloop-ledger-"));
    tempDirs.push(dir);
    const ledger = new HistoryLedger(path.join(dir, "runs"));
    const { ctx, fakes } = setup([failingState("addsNumbers"), GREEN]);

    await new RemediationLoop(ctx, fakes, { ledger }).run();

    const lines = (await readFile(ledger.historyPath, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    const first: unknown = JSON.parse(lines[0] ?? "");
    expect(first).toMatchObject({
      runId: ctx.runId,
      pass: 1,
      workflow: "FixTestFailure",
      outcome: "applied",
    });

    const termination: unknown = JSON.parse(await readFile(ledger.terminationPath, "utf-8"));
    expect(termination).toMatchObject({
      runId: ctx.runId,
      passes: 2,
      termination: { state: "terminated", status: "success", published: true },
    });
  });
});
