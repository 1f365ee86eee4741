import type { CommandResult, CommandRunner, RunCommandOptions } from "../../src/adapters/process.js";

export interface RecordedCommand {
  command: string[];
  options: RunCommandOptions;
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: "", stderr: "", cancelled: false, ...overrides };
}

/**
 * A CommandRunner that answers from a queue of results (the last one repeats)
 * and records every invocation.
 */
export function createScriptedRunner(...results: Array<Partial<CommandResult>>): {
  runner: CommandRunner;
  calls: RecordedCommand[];
} {
  const calls: RecordedCommand[] = [];
  const queue = results.map((r) => commandResult(r));
  const runner: CommandRunner = async (command, options) => {
    calls.push({ command: [...command], options });
    return (queue.length > 1 ? queue.shift() : queue[0]) ?? commandResult();
  };
  return { runner, calls };
}
