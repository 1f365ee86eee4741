import { Cause, Effect, Exit, Option } from "effect";

export interface RunEffectPromiseOptions {
  signal?: AbortSignal;
}

export class EffectInterruptedError extends Error {
  readonly reason: unknown;

  constructor(reason?: unknown) {
    const detail =
      reason !== undefined && reason !== null
        ? `: ${reason instanceof Error ? reason.message : String(reason)}`
        : "";
    super(`Effect execution interrupted${detail}`);
    this.name = "EffectInterruptedError";
    this.reason = reason;
  }
}

export function runEffectPromise<A, E>(
  effect: Effect.Effect<A, E, never>,
  options?: RunEffectPromiseOptions,
): Promise<A> {
  return Effect.runPromiseExit(effect, { signal: options?.signal }).then((exit) => {
    if (Exit.isSuccess(exit)) {
      return exit.value;
    }

    const failure = Cause.failureOption(exit.cause);
    if (Option.isSome(failure)) {
      throw failure.value;
    }
    if (Cause.isInterrupted(exit.cause)) {
      throw new EffectInterruptedError(options?.signal?.reason);
    }
    throw Cause.squash(exit.cause);
  });
}

export function sleep(ms: number): Effect.Effect<void> {
  return Effect.sleep(ms);
}

export function withTimeout<A, E, ETimeout>(
  effect: Effect.Effect<A, E, never>,
  timeoutMs: number,
  onTimeout: () => ETimeout,
): Effect.Effect<A, E | ETimeout, never> {
  return effect.pipe(
    Effect.timeoutFail({
      duration: timeoutMs,
      onTimeout,
    }),
  );
}

/**
 * Await a collaborator call under a deadline. Rejections are mapped through
 * `onError`; a missed deadline fails with `onTimeout()`. A non-positive
 * `timeoutMs` disables the deadline.
 */
export function callWithTimeout<A, E>(
  call: () => Promise<A>,
  timeoutMs: number,
  onTimeout: () => E,
  onError: (cause: unknown) => E,
): Promise<A> {
  const attempt = Effect.tryPromise({ try: call, catch: onError });
  const bounded = timeoutMs > 0 ? withTimeout(attempt, timeoutMs, onTimeout) : attempt;
  return runEffectPromise(bounded);
}

export function delay(ms: number): Promise<void> {
  return runEffectPromise(sleep(ms));
}
