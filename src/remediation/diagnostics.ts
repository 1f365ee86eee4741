import type { CompileErrorLocation } from "../types/index.js";

const MAX_LOCATIONS = 50;

// javac via Maven: "[ERROR] /p/src/main/java/a/B.java:[42,17] cannot find symbol"
const BRACKET_REF = /([^\s[\]]+\.java):\[(\d+)(?:,(\d+))?\]\s*(.*)$/;
// plain javac: "src/main/java/a/B.java:42: error: ';' expected"
const COLON_REF = /([^\s[\]:]+\.java):(\d+):\s*(?:error:\s*)?(.*)$/;
// prose fallback: "compile error at line 42"
const LINE_REF = /\bline\s+(\d+)\b/i;

export class CompileErrorSignature {
  private readonly patterns: RegExp[];

  constructor(patterns: readonly string[]) {
    this.patterns = patterns.map((p) => new RegExp(p, "i"));
  }

  matches(diagnostic: string): boolean {
    return this.patterns.some((re) => re.test(diagnostic));
  }
}

/**
 * Derive a class FQN from a source path by stripping everything up to and
 * including the first matching source root.
 */
export function classFqnFromPath(file: string, sourceRoots: readonly string[]): string | undefined {
  const normalized = file.replace(/\\/g, "/");
  if (!normalized.endsWith(".java")) return undefined;

  let relative: string | undefined;
  for (const root of sourceRoots) {
    const marker = root.replace(/\\/g, "/").replace(/^\.?\/+|\/+$/g, "") + "/";
    const idx = normalized.indexOf(marker);
    if (idx === -1) continue;
    if (idx > 0 && normalized[idx - 1] !== "/") continue;
    relative = normalized.slice(idx + marker.length);
    break;
  }
  if (relative === undefined) {
    const idx = normalized.lastIndexOf("/java/");
    if (idx === -1) return undefined;
    relative = normalized.slice(idx + "/java/".length);
  }

  const fqn = relative.slice(0, -".java".length).split("/").filter(Boolean).join(".");
  return fqn || undefined;
}

/**
 * Pull the compiler's file/line references out of a build diagnostic, in the
 * order printed and without duplicates. A diagnostic with no file reference
 * yields a single location carrying only the message (and a line number when
 * the prose names one).
 */
export function extractCompileErrors(
  diagnostic: string,
  sourceRoots: readonly string[],
): CompileErrorLocation[] {
  const out: CompileErrorLocation[] = [];
  const seen = new Set<string>();

  for (const raw of diagnostic.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    const loc = parseReference(line, sourceRoots);
    if (!loc) continue;
    const id = `${loc.file}:${loc.line}:${loc.column ?? ""}`;
    if (seen.has(id)) continue;
    seen.add(id);
    out.push(loc);
    if (out.length >= MAX_LOCATIONS) break;
  }

  if (out.length > 0) return out;

  const message = diagnostic.split("\n").map((l) => l.trim()).find((l) => l.length > 0) ?? "";
  const lineMatch = LINE_REF.exec(diagnostic);
  const lineNo = lineMatch?.[1];
  return [{ message, ...(lineNo !== undefined ? { line: parseInt(lineNo, 10) } : {}) }];
}

function parseReference(line: string, sourceRoots: readonly string[]): CompileErrorLocation | null {
  const bracket = BRACKET_REF.exec(line);
  if (bracket) {
    const [, file, lineNo, col, message] = bracket;
    if (file === undefined || lineNo === undefined) return null;
    return buildLocation(file, lineNo, col, message, sourceRoots);
  }
  const colon = COLON_REF.exec(line);
  if (colon) {
    const [, file, lineNo, message] = colon;
    if (file === undefined || lineNo === undefined) return null;
    return buildLocation(file, lineNo, undefined, message, sourceRoots);
  }
  return null;
}

function buildLocation(
  file: string,
  lineNo: string,
  col: string | undefined,
  message: string | undefined,
  sourceRoots: readonly string[],
): CompileErrorLocation {
  const classFqn = classFqnFromPath(file, sourceRoots);
  return {
    file,
    ...(classFqn ? { classFqn } : {}),
    line: parseInt(lineNo, 10),
    ...(col !== undefined ? { column: parseInt(col, 10) } : {}),
    message: (message ?? "").trim(),
  };
}
