/**
 * Retry Policy Service
 *
 * Bounded retry with exponential backoff for relay sends. Every relay
 * failure is retryable; the budget counts failed attempts only.
 *
 * Formula: delay = base_delay * 2^(failedAttempts - 1)
 * Example (base 1s, 3 retries): fail → 1s → fail → 2s → fail → exhausted
 */

export interface RetryPolicyConfig {
  maxRetries: number;
  baseDelayMs: number;
}

export type RetryDecision =
  | { shouldRetry: true; delayMs: number; reason: string }
  | { shouldRetry: false; reason: string };

export class RetryPolicyService {
  private config: RetryPolicyConfig;

  constructor(config: Partial<RetryPolicyConfig> = {}) {
    this.config = {
      maxRetries: config.maxRetries ?? 3,
      baseDelayMs: config.baseDelayMs ?? 1000, // 1 second
    };

    if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 1) {
      throw new RangeError(`maxRetries must be a positive integer, got ${this.config.maxRetries}`);
    }
    if (!Number.isFinite(this.config.baseDelayMs) || this.config.baseDelayMs < 0) {
      throw new RangeError(`baseDelayMs must be a non-negative number, got ${this.config.baseDelayMs}`);
    }
  }

  /**
   * Decides what happens after a failed attempt
   *
   * @param failedAttempts - Number of failed attempts so far (1-indexed)
   */
  shouldRetry(failedAttempts: number): RetryDecision {
    if (failedAttempts >= this.config.maxRetries) {
      return {
        shouldRetry: false,
        reason: `Max retries exceeded (${failedAttempts}/${this.config.maxRetries})`,
      };
    }

    const delayMs = this.calculateDelay(failedAttempts);

    return {
      shouldRetry: true,
      reason: `Retryable relay error (attempt ${failedAttempts}/${this.config.maxRetries})`,
      delayMs,
    };
  }

  /**
   * Backoff to sleep after the given number of failed attempts
   *
   * - 1 failure: base
   * - 2 failures: base * 2
   * - 3 failures: base * 4
   */
  calculateDelay(failedAttempts: number): number {
    return this.config.baseDelayMs * Math.pow(2, Math.max(0, failedAttempts - 1));
  }

  /**
   * Formats delay for human-readable logging
   * @returns Formatted string (e.g., "1.5s", "2m 30s")
   */
  formatDelay(delayMs: number): string {
    if (delayMs < 1000) {
      return `${delayMs}ms`;
    }

    if (delayMs < 60000) {
      return `${(delayMs / 1000).toFixed(1)}s`;
    }

    const minutes = Math.floor(delayMs / 60000);
    const seconds = Math.floor((delayMs % 60000) / 1000);
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }

  getConfig(): RetryPolicyConfig {
    return { ...this.config };
  }
}
