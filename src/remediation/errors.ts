/** Build harness or report endpoint unreachable, failing, or timed out. */
export class ProbeError extends Error {
  readonly source: string;

  constructor(source: string, message: string, cause?: unknown) {
    super(`probe failed (${source}): ${message}`);
    this.name = "ProbeError";
    this.source = source;
    this.cause = cause;
  }
}

export class LocateError extends Error {
  readonly classFqn: string | undefined;

  constructor(message: string, classFqn?: string) {
    super(message);
    this.name = "LocateError";
    this.classFqn = classFqn;
  }
}

export class GenerationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "GenerationError";
    this.cause = cause;
  }
}

export class ApplyError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`write rejected for ${path}: ${detail}`);
    this.name = "ApplyError";
    this.path = path;
    this.cause = cause;
  }
}

export class VersionControlError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, cause?: unknown) {
    super(`${operation} failed: ${message}`);
    this.name = "VersionControlError";
    this.operation = operation;
    this.cause = cause;
  }
}

export class StepTimeoutError extends Error {
  readonly step: string;
  readonly timeoutMs: number;

  constructor(step: string, timeoutMs: number) {
    super(`${step} timed out after ${timeoutMs}ms`);
    this.name = "StepTimeoutError";
    this.step = step;
    this.timeoutMs = timeoutMs;
  }
}

export class PublishError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message);
    this.name = "PublishError";
    this.attempts = attempts;
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
