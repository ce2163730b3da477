import { setTimeout as sleepFor } from 'timers/promises';
import type { RelayClient, RelaySendResult } from '../providers/relay-client.interface.js';
import type { DispatchAttempt, DispatchOutcome, OutboundEmail } from '../types/email.types.js';
import { toRelayError } from '../errors/app-errors.js';
import type { RelayTransientError } from '../errors/app-errors.js';
import type { RetryPolicyService } from './retry-policy.service.js';

export interface AttemptEvent {
  dispatchId: string;
  attempt: number;
  recipients: number;
}

export interface RetryEvent {
  dispatchId: string;
  attempt: number;
  error: RelayTransientError;
  nextDelayMs: number;
}

export interface DeliveredEvent {
  dispatchId: string;
  attempts: number;
  messageId?: string;
  durationMs: number;
}

export interface ExhaustedEvent {
  dispatchId: string;
  attempts: number;
  error: RelayTransientError;
  durationMs: number;
}

/**
 * Observability sink for the dispatch state machine.
 * Exactly one of onDelivered / onExhausted is called per dispatch.
 */
export interface DispatchObserver {
  onAttempt(event: AttemptEvent): void;
  onRetry(event: RetryEvent): void;
  onDelivered(event: DeliveredEvent): void;
  onExhausted(event: ExhaustedEvent): void;
}

export interface EmailDispatcherDeps {
  relay: RelayClient;
  retryPolicy: RetryPolicyService;
  observer: DispatchObserver;
  /** Suspends between attempts; defaults to a timer */
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Email Dispatcher
 *
 * Drives one outbound message to a terminal outcome:
 *
 *   Idle → Attempting(n) → Delivered
 *                        → Retrying(n) → sleep(backoff) → Attempting(n)
 *                        → Exhausted
 *
 * Attempts for one message are strictly sequential. The backoff sleep only
 * follows a failed attempt that will be retried, never the terminal one.
 * Relay failures never escape as exceptions: they are folded into the
 * Exhausted outcome.
 */
export class EmailDispatcher {
  private relay: RelayClient;
  private retryPolicy: RetryPolicyService;
  private observer: DispatchObserver;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(deps: EmailDispatcherDeps) {
    this.relay = deps.relay;
    this.retryPolicy = deps.retryPolicy;
    this.observer = deps.observer;
    this.sleep = deps.sleep ?? ((ms) => sleepFor(ms));
    this.now = deps.now ?? Date.now;
  }

  async dispatch(email: OutboundEmail): Promise<DispatchOutcome> {
    const startedAt = this.now();
    const attempts: DispatchAttempt[] = [];
    let backoffBeforeMs = 0;

    for (let attempt = 1; ; attempt++) {
      this.observer.onAttempt({
        dispatchId: email.dispatchId,
        attempt,
        recipients: email.recipients.length,
      });

      const result = await this.sendOnce(email);

      if (result.ok) {
        attempts.push({ attempt, outcome: 'success', backoffBeforeMs });
        this.observer.onDelivered({
          dispatchId: email.dispatchId,
          attempts: attempt,
          messageId: result.messageId,
          durationMs: this.now() - startedAt,
        });
        return {
          status: 'delivered',
          dispatchId: email.dispatchId,
          attempts,
          messageId: result.messageId,
        };
      }

      attempts.push({ attempt, outcome: 'failure', error: result.error, backoffBeforeMs });

      // Every attempt so far has failed, so the failure count is the attempt number
      const decision = this.retryPolicy.shouldRetry(attempt);

      if (!decision.shouldRetry) {
        this.observer.onExhausted({
          dispatchId: email.dispatchId,
          attempts: attempt,
          error: result.error,
          durationMs: this.now() - startedAt,
        });
        return {
          status: 'exhausted',
          dispatchId: email.dispatchId,
          attempts,
          lastError: result.error,
        };
      }

      this.observer.onRetry({
        dispatchId: email.dispatchId,
        attempt,
        error: result.error,
        nextDelayMs: decision.delayMs,
      });

      await this.sleep(decision.delayMs);
      backoffBeforeMs = decision.delayMs;
    }
  }

  /**
   * One relay call. A relay that throws instead of returning a failure
   * result is treated the same as one that reports the failure.
   */
  private async sendOnce(email: OutboundEmail): Promise<RelaySendResult> {
    try {
      return await this.relay.sendOnce({
        from: email.from,
        recipients: email.recipients,
        raw: email.raw,
      });
    } catch (error) {
      return { ok: false, error: toRelayError(error) };
    }
  }
}
