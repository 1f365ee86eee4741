const UNIT_MS: Record<string, number> = {
  h: 3600_000,
  m: 60_000,
  s: 1000,
  ms: 1,
};

/**
 * Parse a duration like "5m", "30s", "2h", "1h30m" or "250ms" into
 * milliseconds. At least one unit is required and the total must be positive.
 */
export function parseDuration(input: string): number {
  const trimmed = input.trim();
  if (trimmed === "") {
    throw new Error(`Invalid duration string: "${input}"`);
  }

  // Repeated "<number><unit>" segments, e.g. "1h30m10s500ms".
  const tokenRe = /(\d+)(ms|s|m|h)/g;
  let totalMs = 0;
  let matchedLen = 0;

  for (const match of trimmed.matchAll(tokenRe)) {
    const [token, digits, unit] = match;
    if (digits === undefined || unit === undefined) continue;
    totalMs += parseInt(digits, 10) * (UNIT_MS[unit] ?? 0);
    matchedLen += token.length;
  }

  if (matchedLen !== trimmed.length || totalMs <= 0) {
    throw new Error(`Invalid duration string: "${input}"`);
  }

  return totalMs;
}

/** Inverse of parseDuration for log output: 5400000 → "1h30m". */
export function formatDuration(ms: number): string {
  if (ms <= 0) return "0ms";
  let rest = Math.floor(ms);
  const parts: string[] = [];
  for (const unit of ["h", "m", "s", "ms"] as const) {
    const size = UNIT_MS[unit] ?? 1;
    const count = Math.floor(rest / size);
    if (count > 0) {
      parts.push(`${count}${unit}`);
      rest -= count * size;
    }
  }
  return parts.join("");
}
