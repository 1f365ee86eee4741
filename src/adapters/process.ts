import { spawn } from "node:child_process";

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024; // 10 MB

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  cancelled: boolean;
  /** Set when the command could not be started at all. */
  spawnError?: string;
}

export interface RunCommandOptions {
  cwd: string;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

/** Runs one command (argv form, no shell) and collects its output. */
export type CommandRunner = (command: readonly string[], options: RunCommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, options) => {
  return new Promise((resolve) => {
    const [file, ...args] = command;
    if (file === undefined) {
      resolve({ exitCode: 1, stdout: "", stderr: "empty command", cancelled: false });
      return;
    }

    const mergedEnv: Record<string, string> = {};
    for (const [k, v] of Object.entries(process.env)) {
      if (v !== undefined) mergedEnv[k] = v;
    }

    const proc = spawn(file, args, {
      cwd: options.cwd,
      stdio: [options.input !== undefined ? "pipe" : "ignore", "pipe", "pipe"],
      env: { ...mergedEnv, ...(options.env ?? {}) },
    });

    let stdout = "";
    let stderr = "";
    let cancelled = false;
    let stdoutTruncated = false;
    let stderrTruncated = false;

    proc.stdout?.on("data", (data: Buffer) => {
      if (stdoutTruncated) return;
      stdout += data.toString();
      if (stdout.length > MAX_OUTPUT_BYTES) {
        stdout = stdout.slice(0, MAX_OUTPUT_BYTES) + "\n[truncated]";
        stdoutTruncated = true;
      }
    });
    proc.stderr?.on("data", (data: Buffer) => {
      if (stderrTruncated) return;
      stderr += data.toString();
      if (stderr.length > MAX_OUTPUT_BYTES) {
        stderr = stderr.slice(0, MAX_OUTPUT_BYTES) + "\n[truncated]";
        stderrTruncated = true;
      }
    });

    if (options.input !== undefined && proc.stdin) {
      // EPIPE when the child exits without reading stdin; the exit code tells the story.
      proc.stdin.on("error", (err) => {
        stderr += `stdin: ${err.message}\n`;
      });
      proc.stdin.end(options.input);
    }

    const signal = options.signal;
    const onAbort = () => {
      cancelled = true;
      proc.kill("SIGTERM");
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    proc.on("close", (code) => {
      signal?.removeEventListener("abort", onAbort);
      resolve({ exitCode: code ?? 1, stdout, stderr, cancelled });
    });

    proc.on("error", (err) => {
      signal?.removeEventListener("abort", onAbort);
      stderr += err.message;
      resolve({ exitCode: 1, stdout, stderr, cancelled, spawnError: err.message });
    });
  });
};

/** Last `maxLines` non-empty lines of `text`. */
export function tail(text: string, maxLines: number): string {
  const lines = text.split("\n").filter((line) => line.trim() !== "");
  return lines.slice(-maxLines).join("\n");
}
