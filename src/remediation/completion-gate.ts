import { callWithTimeout, delay } from "../core/effect-concurrency.js";
import type { PublishConfig } from "../config/types.js";
import type { Logger, MetricsCollector } from "../core/observability.js";
import type { LoopTermination, RepositoryState, Snapshot } from "../types/index.js";
import type { VersionControl } from "./collaborators.js";
import type { RunContext } from "./context.js";
import {
  errorMessage,
  PublishError,
  StepTimeoutError,
  VersionControlError,
} from "./errors.js";
import { RetryPolicy } from "./retry-policy.js";
import { describeMetrics, metricsOf } from "./targets.js";
import { meetsCompletion } from "./triage.js";

/**
 * Terminal step. Re-validates the completion preconditions, refuses to publish
 * from a dirty tree, then pushes (and optionally opens a pull request) at most
 * once per gate.
 */
export class CompletionGate {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly publish: PublishConfig;
  private readonly retry: RetryPolicy;
  private readonly stepTimeoutMs: number;
  private readonly publishTimeoutMs: number;
  private attempted = false;

  constructor(
    ctx: RunContext,
    private readonly vcs: VersionControl,
    random?: () => number,
  ) {
    this.logger = ctx.logger("gate");
    this.metrics = ctx.metrics;
    this.publish = ctx.settings.publish;
    this.retry = new RetryPolicy(this.publish.retry, random);
    this.stepTimeoutMs = ctx.settings.timeouts.stepMs;
    this.publishTimeoutMs = ctx.settings.timeouts.publishMs;
  }

  async complete(snapshot: Snapshot): Promise<LoopTermination> {
    if (!meetsCompletion(snapshot)) {
      const diagnostic = `completion preconditions unmet: ${describeMetrics(metricsOf(snapshot))}`;
      this.logger.warn(diagnostic);
      return { state: "terminated", status: "blocked", reason: "PreconditionsUnmet", diagnostic };
    }

    if (this.attempted) {
      return {
        state: "aborted",
        reason: "InconsistentState",
        message: "publication was already attempted by this run",
      };
    }
    this.attempted = true;

    const repository = await callWithTimeout<RepositoryState, Error>(
      () => this.vcs.status(),
      this.stepTimeoutMs,
      () => new StepTimeoutError("status", this.stepTimeoutMs),
      (cause) => new VersionControlError("status", errorMessage(cause), cause),
    );
    if (!repository.clean) {
      const message = "working tree has uncommitted changes at completion";
      this.logger.error(message);
      return { state: "aborted", reason: "InconsistentState", message };
    }

    if (!this.publish.enabled) {
      this.logger.info("Completion preconditions hold; publishing disabled");
      return { state: "terminated", status: "success", published: false };
    }

    await this.withRetry("push", () => this.vcs.push());
    this.logger.info(`Pushed to ${this.publish.remote}`);

    const pr = this.publish.pullRequest;
    if (!pr) {
      return { state: "terminated", status: "success", published: true };
    }
    const requestUrl = await this.withRetry("pull request", () => this.vcs.openRequest(pr.title, pr.body));
    this.logger.info(`Opened pull request ${requestUrl}`, { base: pr.base });
    return { state: "terminated", status: "success", published: true, requestUrl };
  }

  private async withRetry<A>(operation: string, call: () => Promise<A>): Promise<A> {
    for (let attempt = 0; ; attempt++) {
      this.metrics.counter("publish_attempts_total", 1, { operation });
      try {
        return await callWithTimeout<A, Error>(
          call,
          this.publishTimeoutMs,
          () => new StepTimeoutError(operation, this.publishTimeoutMs),
          (cause) => new VersionControlError(operation, errorMessage(cause), cause),
        );
      } catch (err) {
        const decision = this.retry.shouldRetry(attempt);
        if (!decision.retry) {
          throw new PublishError(`${operation} failed after ${attempt + 1} attempts: ${errorMessage(err)}`, attempt + 1, err);
        }
        this.logger.warn(`${operation} failed, retrying in ${Math.round(decision.delayMs)}ms`, {
          attempt: attempt + 1,
          error: errorMessage(err),
        });
        await delay(decision.delayMs);
      }
    }
  }
}
