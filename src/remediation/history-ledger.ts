import { appendFile, mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AbortReason, IterationRecord, LoopTermination } from "../types/index.js";

export type SerializedTermination =
  | Exclude<LoopTermination, { state: "aborted" }>
  | { state: "aborted"; reason: AbortReason; message: string; error?: { name: string; message: string } };

export interface LedgerTermination {
  runId: string;
  finishedAt: number;
  passes: number;
  termination: SerializedTermination;
}

/**
 * Append-only audit trail of a run: one JSON line per pass in
 * `history.jsonl`, and the final outcome in `termination.json`.
 */
export class HistoryLedger {
  constructor(private readonly dir: string) {}

  get historyPath(): string {
    return path.join(this.dir, "history.jsonl");
  }

  get terminationPath(): string {
    return path.join(this.dir, "termination.json");
  }

  async append(runId: string, record: IterationRecord): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await appendFile(this.historyPath, JSON.stringify({ runId, ...record }) + "\n", "utf-8");
  }

  async writeTermination(runId: string, passes: number, termination: LoopTermination): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const entry: LedgerTermination = {
      runId,
      finishedAt: Date.now(),
      passes,
      termination: serializeTermination(termination),
    };
    // Atomic write: temp file, then rename
    const tmpPath = this.terminationPath + ".tmp";
    await writeFile(tmpPath, JSON.stringify(entry, null, 2), "utf-8");
    await rename(tmpPath, this.terminationPath);
  }
}

export function serializeTermination(termination: LoopTermination): SerializedTermination {
  if (termination.state !== "aborted") return termination;
  const { reason, message, error } = termination;
  return error
    ? { state: "aborted", reason, message, error: { name: error.name, message: error.message } }
    : { state: "aborted", reason, message };
}
