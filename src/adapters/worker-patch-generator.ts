import type { AgentWorker, GeneratorConfig } from "../config/types.js";
import type { PatchGenerator, PatchRequest } from "../remediation/collaborators.js";
import { GenerationError } from "../remediation/errors.js";
import { runCommand, tail, type CommandRunner } from "./process.js";

const FENCED_BLOCK = /```[^\n`]*\n([\s\S]*?)```/g;

export function buildPrompt(request: PatchRequest): string {
  const { target, file, context } = request;
  const lines: string[] = [];

  switch (target.workflow) {
    case "FixCompileError": {
      const { error } = target;
      lines.push("The Java project does not compile. Fix this compiler error with the smallest possible change:");
      lines.push("");
      lines.push(`  ${error.message}`);
      if (error.line !== undefined) {
        lines.push(`  at line ${error.line}${error.column !== undefined ? `, column ${error.column}` : ""}`);
      }
      break;
    }
    case "FixTestFailure": {
      const { failure } = target;
      lines.push(`The test ${failure.testClass}#${failure.testMethod} fails (${failure.kind}).`);
      lines.push(`Make it pass with the smallest possible change to ${file.path}; keep the intent of the test.`);
      lines.push("");
      lines.push(`Message: ${failure.message}`);
      if (failure.stackTrace) {
        lines.push("Stack trace:");
        lines.push(tail(failure.stackTrace, 30));
      }
      break;
    }
    case "ImproveCoverage":
      lines.push(`Line ${target.line} of ${target.sourceClass} is not covered by any test.`);
      lines.push(`Add one focused test case to ${file.path} that executes it. Do not modify existing tests.`);
      break;
  }

  lines.push("");
  lines.push(`Current content of ${file.path}:`);
  lines.push("```java", file.content.replace(/\n$/, ""), "```");
  if (context) {
    lines.push("");
    lines.push(`For reference only, ${context.path}:`);
    lines.push("```java", context.content.replace(/\n$/, ""), "```");
  }
  lines.push("");
  lines.push(`Reply with the complete updated content of ${file.path} in a single fenced code block and nothing else.`);
  return lines.join("\n");
}

/** The last fenced code block of `stdout`, or all of it when there is none. */
export function extractPatchedContent(stdout: string): string {
  let last: string | undefined;
  for (const match of stdout.matchAll(FENCED_BLOCK)) {
    last = match[1];
  }
  const body = (last ?? stdout).trimEnd();
  if (body.trim() === "") {
    throw new GenerationError("generator returned no content");
  }
  return body + "\n";
}

export function buildCommand(config: GeneratorConfig, prompt: string): { command: string[]; input?: string } {
  if (config.worker === "CUSTOM") {
    return { command: [...config.command], input: prompt };
  }
  return { command: agentCommand(config.worker, prompt, config.model) };
}

function agentCommand(worker: AgentWorker, prompt: string, model?: string): string[] {
  const modelArgs = model ? ["--model", model] : [];
  switch (worker) {
    case "CLAUDE_CODE":
      return ["claude", ...modelArgs, "--print", prompt, "--output-format", "text"];
    case "CODEX_CLI":
      return ["codex", ...modelArgs, "--quiet", "--prompt", prompt];
    case "OPENCODE":
      return ["opencode", "run", ...modelArgs, prompt];
  }
}

/**
 * Obtains patched file content from a coding-agent CLI. The agent gets a
 * prompt describing the single target and answers with the whole file.
 */
export class WorkerPatchGenerator implements PatchGenerator {
  constructor(
    private readonly config: GeneratorConfig,
    private readonly cwd: string,
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async generate(request: PatchRequest): Promise<string> {
    const prompt = buildPrompt(request);
    const { command, input } = buildCommand(this.config, prompt);
    const result = await this.runner(command, {
      cwd: this.cwd,
      ...(input !== undefined ? { input } : {}),
      env: { GREENLOOP_TARGET: request.target.key, GREENLOOP_FILE: request.file.path },
    });

    if (result.spawnError !== undefined) {
      throw new GenerationError(`cannot start ${command[0] ?? "generator"}: ${result.spawnError}`);
    }
    if (result.exitCode !== 0) {
      const detail = tail(result.stderr, 5) || `exit code ${result.exitCode}`;
      throw new GenerationError(`${command[0] ?? "generator"} failed: ${detail}`);
    }
    return extractPatchedContent(result.stdout);
  }
}
