export interface RetryPolicyConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export const DEFAULT_RETRY_CONFIG: RetryPolicyConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  maxAttempts: 3,
};

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
}

/**
 * Bounded exponential backoff for publication calls (push, pull request).
 * Nothing else in the loop is retried.
 */
export class RetryPolicy {
  private readonly config: RetryPolicyConfig;

  constructor(
    config?: Partial<RetryPolicyConfig>,
    private readonly random: () => number = Math.random,
  ) {
    this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  shouldRetry(attemptIndex: number): RetryDecision {
    if (attemptIndex >= this.config.maxAttempts - 1) {
      return { retry: false, delayMs: 0 };
    }

    // Exponential backoff with full jitter:
    // delay = random(0, min(maxDelay, baseDelay * 2^attempt))
    const exponentialDelay = this.config.baseDelayMs * Math.pow(2, attemptIndex);
    const cappedDelay = Math.min(this.config.maxDelayMs, exponentialDelay);
    const jitteredDelay = this.random() * cappedDelay;

    return { retry: true, delayMs: jitteredDelay };
  }
}
