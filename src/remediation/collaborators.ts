/**
 * Narrow interfaces for everything the remediation loop talks to. The loop
 * depends only on these; `src/adapters/` provides the process-backed
 * implementations and the tests provide scripted in-memory ones.
 */
import type {
  BuildStatus,
  CoverageGap,
  QualityDashboard,
  RemediationTarget,
  RepositoryState,
  TestFailure,
} from "../types/index.js";

export interface BuildRunner {
  run(): Promise<BuildStatus>;
}

export interface DashboardReader {
  read(): Promise<QualityDashboard>;
}

export interface FailureReporter {
  list(): Promise<TestFailure[]>;
}

export interface CoverageReporter {
  list(): Promise<CoverageGap[]>;
}

export interface SourceLocator {
  /** Resolve a fully-qualified class name to a file path, or null when no file matches. */
  find(classFqn: string): Promise<string | null>;
}

export interface FileStore {
  read(path: string): Promise<string>;
  /** Replace the whole file. Rejects when the write is refused. */
  write(path: string, content: string): Promise<void>;
}

export interface FileContent {
  path: string;
  content: string;
}

export interface PatchRequest {
  target: RemediationTarget;
  /** The file the patch replaces. */
  file: FileContent;
  /** A related file handed over for reference only. */
  context?: FileContent;
}

export interface PatchGenerator {
  /** Returns the full patched content of `request.file`. */
  generate(request: PatchRequest): Promise<string>;
}

export interface VersionControl {
  status(): Promise<RepositoryState>;
  stageAll(): Promise<void>;
  commit(message: string): Promise<void>;
  push(): Promise<void>;
  /** Opens a pull request for the current branch and returns its URL. */
  openRequest(title: string, body?: string): Promise<string>;
}

export interface Collaborators {
  build: BuildRunner;
  dashboard: DashboardReader;
  failures: FailureReporter;
  coverage: CoverageReporter;
  locator: SourceLocator;
  files: FileStore;
  generator: PatchGenerator;
  vcs: VersionControl;
}
