import path from "node:path";
import type { GreenloopConfig } from "../config/types.js";
import type { Collaborators } from "../remediation/collaborators.js";
import { CommandBuildRunner } from "./command-build-runner.js";
import { FsFileStore } from "./fs-file-store.js";
import { GitVersionControl } from "./git-version-control.js";
import {
  CommandCoverageReporter,
  CommandDashboardReader,
  CommandFailureReporter,
  JsonCommand,
} from "./json-command-reporter.js";
import { MavenSourceLocator } from "./maven-source-locator.js";
import { runCommand, type CommandRunner } from "./process.js";
import { WorkerPatchGenerator } from "./worker-patch-generator.js";

export { CommandBuildRunner, buildDiagnostic } from "./command-build-runner.js";
export { FsFileStore } from "./fs-file-store.js";
export { GitCommandError, GitVersionControl } from "./git-version-control.js";
export type { GitVersionControlOptions } from "./git-version-control.js";
export {
  CommandCoverageReporter,
  CommandDashboardReader,
  CommandFailureReporter,
  JsonCommand,
  ReportFormatError,
  parseDashboard,
  parseFailures,
  parseGaps,
} from "./json-command-reporter.js";
export { MavenSourceLocator, javaFiles } from "./maven-source-locator.js";
export { runCommand, tail } from "./process.js";
export type { CommandResult, CommandRunner, RunCommandOptions } from "./process.js";
export { WorkerPatchGenerator, buildCommand, buildPrompt, extractPatchedContent } from "./worker-patch-generator.js";

/** Wire the process-backed collaborators for an absolute workspace path. */
export function createCollaborators(
  config: GreenloopConfig,
  workspace: string,
  runner: CommandRunner = runCommand,
): Collaborators {
  const { reports } = config;
  const pullRequest = config.publish.pullRequest;
  return {
    build: new CommandBuildRunner(config.build.command, workspace, runner),
    dashboard: new CommandDashboardReader(new JsonCommand("dashboard", reports.dashboard, workspace, runner)),
    failures: new CommandFailureReporter(new JsonCommand("failures", reports.failures, workspace, runner)),
    coverage: new CommandCoverageReporter(new JsonCommand("coverage", reports.coverage, workspace, runner)),
    locator: new MavenSourceLocator(workspace, config.sources.roots),
    files: new FsFileStore(workspace),
    generator: new WorkerPatchGenerator(config.generator, workspace, runner),
    vcs: new GitVersionControl(
      workspace,
      {
        remote: config.publish.remote,
        ...(pullRequest ? { base: pullRequest.base } : {}),
        exclude: ledgerExclusions(config, workspace),
      },
      runner,
    ),
  };
}

/**
 * The ledger directory as a git pathspec when it sits inside the workspace,
 * so the run's own audit files never dirty the tree or land in a commit.
 */
export function ledgerExclusions(config: Pick<GreenloopConfig, "ledger">, workspace: string): string[] {
  if (!config.ledger) return [];
  const relative = path.relative(workspace, path.resolve(workspace, config.ledger.dir));
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) return [];
  return [relative.split(path.sep).join("/")];
}
