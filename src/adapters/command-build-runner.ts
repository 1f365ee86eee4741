import type { BuildRunner } from "../remediation/collaborators.js";
import type { BuildStatus } from "../types/index.js";
import { runCommand, tail, type CommandRunner } from "./process.js";

const FAILURE_MARKER = "BUILD FAILURE";
const ERROR_LINE = /^\[ERROR\]/;
const DIAGNOSTIC_TAIL_LINES = 50;

/**
 * Runs the build and reduces its output to a BuildStatus. A build that cannot
 * be started at all rejects; the probe turns that into a ProbeError.
 */
export class CommandBuildRunner implements BuildRunner {
  constructor(
    private readonly command: readonly string[],
    private readonly cwd: string,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async run(): Promise<BuildStatus> {
    const result = await this.runner(this.command, { cwd: this.cwd });
    if (result.spawnError !== undefined) {
      throw new Error(`cannot start ${this.command.join(" ")}: ${result.spawnError}`);
    }

    const output = result.stderr ? `${result.stdout}\n${result.stderr}` : result.stdout;
    if (result.exitCode === 0 && !output.includes(FAILURE_MARKER)) {
      return { kind: "ok" };
    }
    return { kind: "failed", diagnostic: buildDiagnostic(output, result.exitCode) };
  }
}

/** The `[ERROR]` lines of the build log, or its tail when there are none. */
export function buildDiagnostic(output: string, exitCode: number): string {
  const errors = output.split("\n").filter((line) => ERROR_LINE.test(line));
  if (errors.length > 0) return errors.join("\n");
  const last = tail(output, DIAGNOSTIC_TAIL_LINES);
  return last || `build exited with code ${exitCode}`;
}
