import type {
  AttemptEvent,
  DeliveredEvent,
  DispatchObserver,
  ExhaustedEvent,
  RetryEvent,
} from './email-dispatcher.service.js';
import type { StructuredLogger } from './logger.service.js';
import type { MetricsService } from './metrics.service.js';
import type { RetryPolicyService } from './retry-policy.service.js';

/**
 * Default dispatch observer: structured log events plus Prometheus metrics
 */
export class LoggingDispatchObserver implements DispatchObserver {
  constructor(
    private readonly logger: StructuredLogger,
    private readonly metrics: MetricsService,
    private readonly retryPolicy: RetryPolicyService
  ) {}

  onAttempt(event: AttemptEvent): void {
    this.logger.dispatchAttempt({
      dispatchId: event.dispatchId,
      attempt: event.attempt,
      recipients: event.recipients,
    });
  }

  onRetry(event: RetryEvent): void {
    const reason = event.error.relayCode ?? event.error.code;

    this.metrics.recordAttempt('failure');
    this.metrics.recordRetry(reason, event.nextDelayMs);
    this.logger.dispatchRetry({
      dispatchId: event.dispatchId,
      attempt: event.attempt,
      error: event.error.message,
      error_code: reason,
      nextDelay: this.retryPolicy.formatDelay(event.nextDelayMs),
      nextDelayMs: event.nextDelayMs,
    });
  }

  onDelivered(event: DeliveredEvent): void {
    this.metrics.recordAttempt('success');
    this.metrics.recordOutcome('delivered', event.durationMs / 1000);
    this.logger.dispatchDelivered({
      dispatchId: event.dispatchId,
      attempts: event.attempts,
      messageId: event.messageId,
      duration: event.durationMs,
    });
  }

  onExhausted(event: ExhaustedEvent): void {
    this.metrics.recordAttempt('failure');
    this.metrics.recordOutcome('exhausted', event.durationMs / 1000);
    this.logger.dispatchExhausted({
      dispatchId: event.dispatchId,
      attempts: event.attempts,
      error: event.error.message,
      error_code: event.error.relayCode ?? event.error.code,
      duration: event.durationMs,
    });
  }
}
