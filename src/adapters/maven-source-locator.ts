import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import type { SourceLocator } from "../remediation/collaborators.js";

/**
 * Resolves class names against Maven's source layout
 * (`<root>/<package path>/<Outer>.java`). Roots are searched in order, so the
 * main tree wins over the test tree when both define a class.
 */
export class MavenSourceLocator implements SourceLocator {
  private readonly roots: string[];

  constructor(workspace: string, roots: readonly string[]) {
    this.roots = roots.map((root) => path.resolve(workspace, root));
  }

  async find(classFqn: string): Promise<string | null> {
    const outer = outerClassName(classFqn);
    if (outer === "") return null;

    const relative = outer.split(".").join(path.sep) + ".java";
    for (const root of this.roots) {
      const candidate = path.join(root, relative);
      if (await isFile(candidate)) return candidate;
    }

    // Unqualified names (default package, or a report that dropped the package).
    if (!outer.includes(".")) {
      for (const root of this.roots) {
        const match = (await javaFiles(root)).find((file) => path.basename(file) === `${outer}.java`);
        if (match) return match;
      }
    }
    return null;
  }
}

function outerClassName(classFqn: string): string {
  const trimmed = classFqn.trim();
  const idx = trimmed.indexOf("$");
  return idx === -1 ? trimmed : trimmed.slice(0, idx);
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

/** Every `.java` file under `root`, sorted; empty when the root does not exist. */
export async function javaFiles(root: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(root, { recursive: true });
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
  return entries
    .filter((entry) => entry.endsWith(".java"))
    .sort()
    .map((entry) => path.join(root, entry));
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
