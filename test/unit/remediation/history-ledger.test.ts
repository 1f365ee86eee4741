import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, test, expect } from "vitest";
import { ApplyError } from "../../../src/remediation/errors.js";
import { HistoryLedger, serializeTermination } from "../../../src/remediation/history-ledger.js";
import type { IterationRecord } from "../../../src/types/index.js";

const RECORD: IterationRecord = {
  pass: 1,
  workflow: "ImproveCoverage",
  target: "coverage:com.acme.Calculator:17",
  outcome: "applied",
  commitMessage: "test(coverage): cover com.acme.Calculator line 17",
  metrics: { compiles: true, failures: 0, errors: 0, linePercent: 92.5 },
  timestamp: 1_700_000_000_000,
};

describe("HistoryLedger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "greenloop-ledger-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("appends one JSON line per pass, creating the directory", async () => {
    const ledger = new HistoryLedger(path.join(dir, "nested", ".greenloop"));

    await ledger.append("run-1", RECORD);
    await ledger.append("run-1", { ...RECORD, pass: 2, outcome: "skipped" });

    const text = await readFile(ledger.historyPath, "utf-8");
    const lines = text.split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    expect(JSON.parse(lines[0] ?? "")).toEqual({ runId: "run-1", ...RECORD });
    expect(JSON.parse(lines[1] ?? "")).toMatchObject({ pass: 2, outcome: "skipped" });
  });

  test("writes the termination", async () => {
    const ledger = new HistoryLedger(dir);

    await ledger.writeTermination("run-1", 4, {
      state: "terminated",
      status: "blocked",
      reason: "StagnationDetected",
      diagnostic: "StagnationDetected: 3 applied passes left metrics at failures=1 errors=0 line=100%",
    });

    const written: unknown = JSON.parse(await readFile(ledger.terminationPath, "utf-8"));
    expect(written).toMatchObject({
      runId: "run-1",
      passes: 4,
      termination: { state: "terminated", status: "blocked", reason: "StagnationDetected" },
    });
  });
});

describe("serializeTermination", () => {
  test("reduces the error to its name and message", () => {
    const error = new ApplyError("Calculator.java", new Error("EROFS"));
    expect(
      serializeTermination({ state: "aborted", reason: "ApplyError", message: error.message, error }),
    ).toEqual({
      state: "aborted",
      reason: "ApplyError",
      message: "write rejected for Calculator.java: EROFS",
      error: { name: "ApplyError", message: "write rejected for Calculator.java: EROFS" },
    });
  });

  test("leaves other terminations unchanged", () => {
    const success = { state: "terminated", status: "success", published: false } as const;
    expect(serializeTermination(success)).toBe(success);
  });
});
