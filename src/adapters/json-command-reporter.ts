/**
 * Report collaborators backed by commands that print JSON on stdout. The
 * shapes are the quality-dashboard, test-failure and missing-coverage
 * documents of the Maven report tooling:
 *
 *   dashboard  { test_run_summary: { total_tests, passed, failures, errors, skipped },
 *                code_coverage_summary: { line_coverage_percent, branch_coverage_percent,
 *                                         method_coverage_percent } }
 *   failures   { failures: { "<class>": [{ test, type, message, details }] } }
 *              | { status: "All tests passed!" }
 *   coverage   { "<class fqn>": [<line>, ...] } | { status: "100% Coverage!" }
 *
 * Any document may instead be `{ error: "<message>" }`, which rejects.
 */
import type { CoverageReporter, DashboardReader, FailureReporter } from "../remediation/collaborators.js";
import type { CoverageGap, QualityDashboard, TestFailure } from "../types/index.js";
import { runCommand, tail, type CommandRunner } from "./process.js";

export class ReportFormatError extends Error {
  constructor(report: string, message: string) {
    super(`${report} report: ${message}`);
    this.name = "ReportFormatError";
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireObject(value: unknown, report: string, field: string): JsonObject {
  if (!isObject(value)) throw new ReportFormatError(report, `"${field}" must be an object`);
  return value;
}

function requireNumber(value: unknown, report: string, field: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ReportFormatError(report, `"${field}" must be a number`);
  }
  return value;
}

function numberOr(value: unknown, fallback: number, report: string, field: string): number {
  return value === undefined ? fallback : requireNumber(value, report, field);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function rejectErrorDocument(doc: JsonObject, report: string): void {
  const error = doc["error"];
  if (typeof error === "string") throw new ReportFormatError(report, error);
}

export function parseDashboard(doc: unknown): QualityDashboard {
  const report = "dashboard";
  const root = requireObject(doc, report, "<root>");
  rejectErrorDocument(root, report);
  const tests = requireObject(root["test_run_summary"], report, "test_run_summary");
  const coverage = requireObject(root["code_coverage_summary"], report, "code_coverage_summary");

  const total = requireNumber(tests["total_tests"], report, "test_run_summary.total_tests");
  const failures = requireNumber(tests["failures"], report, "test_run_summary.failures");
  const errors = requireNumber(tests["errors"], report, "test_run_summary.errors");
  const skipped = numberOr(tests["skipped"], 0, report, "test_run_summary.skipped");
  const passed = numberOr(tests["passed"], total - failures - errors - skipped, report, "test_run_summary.passed");

  return {
    testSummary: { total, failures, errors, skipped, passed },
    coverageSummary: {
      linePercent: requireNumber(coverage["line_coverage_percent"], report, "code_coverage_summary.line_coverage_percent"),
      branchPercent: numberOr(coverage["branch_coverage_percent"], 0, report, "code_coverage_summary.branch_coverage_percent"),
      methodPercent: numberOr(coverage["method_coverage_percent"], 0, report, "code_coverage_summary.method_coverage_percent"),
    },
  };
}

export function parseFailures(doc: unknown): TestFailure[] {
  const report = "failures";
  const root = requireObject(doc, report, "<root>");
  rejectErrorDocument(root, report);
  if (root["failures"] === undefined) return [];

  const byClass = requireObject(root["failures"], report, "failures");
  const out: TestFailure[] = [];
  for (const [testClass, entries] of Object.entries(byClass)) {
    if (!Array.isArray(entries)) {
      throw new ReportFormatError(report, `"failures.${testClass}" must be an array`);
    }
    entries.forEach((entry: unknown, i) => {
      const item = requireObject(entry, report, `failures.${testClass}[${i}]`);
      const test = item["test"];
      if (typeof test !== "string" || test === "") {
        throw new ReportFormatError(report, `"failures.${testClass}[${i}].test" must be a non-empty string`);
      }
      out.push({
        testClass,
        testMethod: test,
        kind: item["type"] === "error" ? "error" : "failure",
        message: stringOr(item["message"], ""),
        stackTrace: stringOr(item["details"], ""),
      });
    });
  }
  return out;
}

export function parseGaps(doc: unknown): CoverageGap[] {
  const report = "coverage";
  const root = requireObject(doc, report, "<root>");
  rejectErrorDocument(root, report);

  const out: CoverageGap[] = [];
  for (const [sourceClass, lines] of Object.entries(root)) {
    if (sourceClass === "status") continue;
    if (!Array.isArray(lines)) {
      throw new ReportFormatError(report, `"${sourceClass}" must be an array of line numbers`);
    }
    const uncoveredLines = lines.map((line: unknown, i) => {
      const n = requireNumber(line, report, `${sourceClass}[${i}]`);
      if (!Number.isInteger(n) || n < 1) {
        throw new ReportFormatError(report, `"${sourceClass}[${i}]" must be a positive integer`);
      }
      return n;
    });
    out.push({ sourceClass, uncoveredLines });
  }
  return out;
}

/** Runs a report command and parses its stdout as JSON. */
export class JsonCommand {
  constructor(
    private readonly report: string,
    private readonly command: readonly string[],
    private readonly cwd: string,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async fetch(): Promise<unknown> {
    const result = await this.runner(this.command, { cwd: this.cwd });
    if (result.spawnError !== undefined) {
      throw new ReportFormatError(this.report, `cannot start ${this.command.join(" ")}: ${result.spawnError}`);
    }
    if (result.exitCode !== 0) {
      const detail = tail(result.stderr, 5) || `exit code ${result.exitCode}`;
      throw new ReportFormatError(this.report, `command failed: ${detail}`);
    }
    try {
      return JSON.parse(result.stdout.trim());
    } catch {
      throw new ReportFormatError(this.report, "output is not valid JSON");
    }
  }
}

export class CommandDashboardReader implements DashboardReader {
  constructor(private readonly command: JsonCommand) {}

  async read(): Promise<QualityDashboard> {
    return parseDashboard(await this.command.fetch());
  }
}

export class CommandFailureReporter implements FailureReporter {
  constructor(private readonly command: JsonCommand) {}

  async list(): Promise<TestFailure[]> {
    return parseFailures(await this.command.fetch());
  }
}

export class CommandCoverageReporter implements CoverageReporter {
  constructor(private readonly command: JsonCommand) {}

  async list(): Promise<CoverageGap[]> {
    return parseGaps(await this.command.fetch());
  }
}
