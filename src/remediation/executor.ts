import { callWithTimeout } from "../core/effect-concurrency.js";
import type { Logger, MetricsCollector } from "../core/observability.js";
import type {
  PassOutcome,
  RemediationTarget,
  RemediationWorkflow,
  Snapshot,
} from "../types/index.js";
import type { FileContent, FileStore, PatchGenerator, SourceLocator, VersionControl } from "./collaborators.js";
import type { RunContext } from "./context.js";
import {
  ApplyError,
  errorMessage,
  GenerationError,
  LocateError,
  StepTimeoutError,
  VersionControlError,
} from "./errors.js";
import { selectTarget } from "./targets.js";

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ExecutorCollaborators {
  locator: SourceLocator;
  files: FileStore;
  generator: PatchGenerator;
  vcs: VersionControl;
}

export interface PassResult {
  workflow: RemediationWorkflow;
  target: string | null;
  outcome: PassOutcome;
  detail?: string;
  commitMessage?: string;
  /** Set when the pass failed in a way that must end the loop. */
  fatal?: Error;
}

interface LocatedFiles {
  edit: string;
  context?: string;
}

const TEST_CLASS_SUFFIX = /(?:Tests?|IT)$/;

export function outerClass(classFqn: string): string {
  const idx = classFqn.indexOf("$");
  return idx === -1 ? classFqn : classFqn.slice(0, idx);
}

/** `com.acme.FooTest` → `com.acme.Foo`; null when the name has no test suffix. */
export function classUnderTest(testClass: string): string | null {
  const outer = outerClass(testClass);
  const stripped = outer.replace(TEST_CLASS_SUFFIX, "");
  if (stripped === outer || stripped.endsWith(".") || stripped === "") return null;
  return stripped;
}

export function pairedTestClass(sourceClass: string): string {
  return `${outerClass(sourceClass)}Test`;
}

export function commitMessageFor(target: RemediationTarget): string {
  switch (target.workflow) {
    case "FixCompileError": {
      const { error } = target;
      const where = error.file
        ? `${basename(error.file)}${error.line !== undefined ? `:${error.line}` : ""}`
        : error.classFqn ?? "unknown source";
      return [
        `fix(build): resolve compile error in ${where}`,
        "",
        error.message,
        "",
        `Remediation-Target: ${target.key}`,
      ].join("\n");
    }
    case "FixTestFailure": {
      const { failure } = target;
      return [
        `fix(test): make ${failure.testClass}#${failure.testMethod} pass`,
        "",
        `${failure.kind}: ${failure.message}`,
        "",
        `Remediation-Target: ${target.key}`,
      ].join("\n");
    }
    case "ImproveCoverage":
      return [
        `test(coverage): cover ${target.sourceClass} line ${target.line}`,
        "",
        `Remediation-Target: ${target.key}`,
      ].join("\n");
  }
}

function basename(file: string): string {
  const parts = file.split(/[\\/]/);
  return parts[parts.length - 1] ?? file;
}

// ---------------------------------------------------------------------------
// WorkflowExecutor
// ---------------------------------------------------------------------------

/**
 * Runs one bounded remediation workflow: Select → Locate → Load → Generate →
 * Apply → Record. At most one commit per call, and only after a successful
 * write.
 */
export class WorkflowExecutor {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly stepTimeoutMs: number;
  private readonly generateTimeoutMs: number;

  constructor(
    ctx: RunContext,
    private readonly collaborators: ExecutorCollaborators,
  ) {
    this.logger = ctx.logger("executor");
    this.metrics = ctx.metrics;
    this.stepTimeoutMs = ctx.settings.timeouts.stepMs;
    this.generateTimeoutMs = ctx.settings.timeouts.generateMs;
  }

  async execute(workflow: RemediationWorkflow, snapshot: Snapshot): Promise<PassResult> {
    // Select
    const target = selectTarget(workflow, snapshot);
    if (!target) {
      this.logger.warn(`No ${workflow} target in snapshot`);
      return { workflow, target: null, outcome: "failed", detail: `no ${workflow} target reported` };
    }
    this.logger.info(`Selected ${target.key}`, { workflow });

    try {
      // Locate + Load
      const located = await this.locate(target);
      const file = await this.load(located.edit);
      const context = located.context ? await this.load(located.context) : undefined;

      // Generate
      const patched = await this.generate(target, file, context);
      if (patched === file.content) {
        this.logger.info(`Generated patch for ${target.key} changes nothing`);
        return { workflow, target: target.key, outcome: "skipped", detail: "generated content is unchanged" };
      }

      // Apply
      await this.step(`write ${file.path}`, () => this.collaborators.files.write(file.path, patched), (cause) =>
        new ApplyError(file.path, cause),
      );

      // Record
      const message = commitMessageFor(target);
      await this.step("stage", () => this.collaborators.vcs.stageAll(), (cause) =>
        new VersionControlError("stage", errorMessage(cause), cause),
      );
      await this.step("commit", () => this.collaborators.vcs.commit(message), (cause) =>
        new VersionControlError("commit", errorMessage(cause), cause),
      );
      this.metrics.counter("commits_total", 1, { workflow });
      this.logger.info(`Committed ${target.key}`, { file: file.path });

      return { workflow, target: target.key, outcome: "applied", commitMessage: message };
    } catch (err) {
      return this.failed(workflow, target, err);
    }
  }

  private failed(workflow: RemediationWorkflow, target: RemediationTarget, err: unknown): PassResult {
    if (err instanceof LocateError || err instanceof GenerationError) {
      this.logger.warn(`Pass for ${target.key} failed: ${err.message}`, { error: err.name });
      return { workflow, target: target.key, outcome: "failed", detail: `${err.name}: ${err.message}` };
    }
    const fatal = err instanceof Error ? err : new Error(String(err));
    this.logger.error(`Pass for ${target.key} failed fatally: ${fatal.message}`, { error: fatal.name });
    return { workflow, target: target.key, outcome: "failed", detail: `${fatal.name}: ${fatal.message}`, fatal };
  }

  private async locate(target: RemediationTarget): Promise<LocatedFiles> {
    switch (target.workflow) {
      case "FixCompileError": {
        const { error } = target;
        if (error.classFqn) {
          const found = await this.find(error.classFqn);
          if (found) return { edit: found };
        }
        if (error.file) return { edit: error.file };
        throw new LocateError("build diagnostic names no source file", error.classFqn);
      }
      case "FixTestFailure": {
        const { testClass } = target.failure;
        const testPath = await this.require(testClass);
        const sourceClass = classUnderTest(testClass);
        const sourcePath = sourceClass ? await this.find(sourceClass) : null;
        return sourcePath ? { edit: sourcePath, context: testPath } : { edit: testPath };
      }
      case "ImproveCoverage": {
        const sourcePath = await this.require(target.sourceClass);
        const testPath = await this.require(pairedTestClass(target.sourceClass));
        return { edit: testPath, context: sourcePath };
      }
    }
  }

  private async require(classFqn: string): Promise<string> {
    const found = await this.find(classFqn);
    if (!found) throw new LocateError(`no source file for ${classFqn}`, classFqn);
    return found;
  }

  private find(classFqn: string): Promise<string | null> {
    return this.step(`locate ${classFqn}`, () => this.collaborators.locator.find(classFqn), (cause) =>
      new LocateError(`locating ${classFqn} failed: ${errorMessage(cause)}`, classFqn),
    );
  }

  private async load(path: string): Promise<FileContent> {
    const content = await this.step(`read ${path}`, () => this.collaborators.files.read(path), (cause) =>
      new LocateError(`cannot read ${path}: ${errorMessage(cause)}`),
    );
    return { path, content };
  }

  private generate(target: RemediationTarget, file: FileContent, context?: FileContent): Promise<string> {
    return callWithTimeout(
      () => this.collaborators.generator.generate({ target, file, ...(context ? { context } : {}) }),
      this.generateTimeoutMs,
      () => new GenerationError(`patch generation timed out after ${this.generateTimeoutMs}ms`),
      (cause) => (cause instanceof GenerationError ? cause : new GenerationError(errorMessage(cause), cause)),
    );
  }

  private step<A>(name: string, fn: () => Promise<A>, onError: (cause: unknown) => Error): Promise<A> {
    return callWithTimeout<A, Error>(
      fn,
      this.stepTimeoutMs,
      () => new StepTimeoutError(name, this.stepTimeoutMs),
      onError,
    );
  }
}
