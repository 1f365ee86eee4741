import type { VersionControl } from "../remediation/collaborators.js";
import type { RepositoryState } from "../types/index.js";
import { runCommand, tail, type CommandRunner } from "./process.js";

export interface GitVersionControlOptions {
  remote: string;
  /** Base branch for pull requests; `gh` picks the default branch when unset. */
  base?: string;
  /**
   * Workspace-relative paths git should not see: they never make the tree
   * dirty and are never staged. The run ledger lives here when it sits
   * inside the workspace.
   */
  exclude?: readonly string[];
}

export class GitCommandError extends Error {
  readonly command: string;
  readonly exitCode: number;

  constructor(command: readonly string[], exitCode: number, stderr: string) {
    const detail = tail(stderr, 5);
    super(`${command.join(" ")} exited with ${exitCode}${detail ? `: ${detail}` : ""}`);
    this.name = "GitCommandError";
    this.command = command.join(" ");
    this.exitCode = exitCode;
  }
}

/** Version control through the `git` and `gh` CLIs. */
export class GitVersionControl implements VersionControl {
  constructor(
    private readonly cwd: string,
    private readonly options: GitVersionControlOptions,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async status(): Promise<RepositoryState> {
    const stdout = await this.exec(["git", "status", "--porcelain", ...this.pathspec()]);
    return { clean: stdout.trim() === "" };
  }

  async stageAll(): Promise<void> {
    await this.exec(["git", "add", "-A", ...this.pathspec()]);
  }

  async commit(message: string): Promise<void> {
    await this.exec(["git", "commit", "-m", message]);
  }

  async currentBranch(): Promise<string> {
    const branch = (await this.exec(["git", "rev-parse", "--abbrev-ref", "HEAD"])).trim();
    if (branch === "" || branch === "HEAD") {
      throw new Error("cannot push from a detached HEAD");
    }
    return branch;
  }

  async push(): Promise<void> {
    const branch = await this.currentBranch();
    await this.exec(["git", "push", this.options.remote, branch]);
  }

  async openRequest(title: string, body?: string): Promise<string> {
    const command = ["gh", "pr", "create"];
    if (this.options.base) command.push("--base", this.options.base);
    command.push("--title", title, "--body", body ?? "");
    const stdout = await this.exec(command);
    const lines = stdout.split("\n").map((line) => line.trim()).filter(Boolean);
    return lines.find((line) => /^https?:\/\//.test(line)) ?? lines[lines.length - 1] ?? "";
  }

  private pathspec(): string[] {
    const exclude = this.options.exclude ?? [];
    if (exclude.length === 0) return [];
    return ["--", ".", ...exclude.map((p) => `:(exclude)${p}`)];
  }

  private async exec(command: string[]): Promise<string> {
    const result = await this.runner(command, { cwd: this.cwd });
    if (result.spawnError !== undefined) {
      throw new Error(`cannot start ${command[0] ?? "command"}: ${result.spawnError}`);
    }
    if (result.exitCode !== 0) {
      throw new GitCommandError(command, result.exitCode, result.stderr);
    }
    return result.stdout;
  }
}
