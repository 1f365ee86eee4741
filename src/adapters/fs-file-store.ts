import { readFile, rename, unlink, writeFile } from "node:fs/promises";
import path from "node:path";
import type { FileStore } from "../remediation/collaborators.js";

/**
 * UTF-8 file access relative to the workspace. Writes replace the whole file
 * through a temp file and a rename, so a reader never sees a half-written
 * source file.
 */
export class FsFileStore implements FileStore {
  constructor(private readonly workspace: string) {}

  resolve(file: string): string {
    return path.resolve(this.workspace, file);
  }

  async read(file: string): Promise<string> {
    return readFile(this.resolve(file), "utf-8");
  }

  async write(file: string, content: string): Promise<void> {
    const target = this.resolve(file);
    const tmpPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
    try {
      await writeFile(tmpPath, content, "utf-8");
      await rename(tmpPath, target);
    } catch (err) {
      await unlink(tmpPath).catch(() => undefined);
      throw err;
    }
  }
}
