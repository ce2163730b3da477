/**
 * Email Sending Orchestrator
 *
 * Takes one send request from validation to a result the route can answer:
 * - Validates every recipient (first invalid one rejects the whole request)
 * - Records recipients in the idempotency store (best-effort)
 * - Formats the wire message
 * - Dispatches in the configured mode:
 *   - sync: waits for the dispatcher's terminal outcome
 *   - async: hands the dispatch to the queue and returns "accepted"
 *
 * Usage:
 * ```typescript
 * const orchestrator = new EmailOrchestrator({ mode: 'sync', senderEmail, dispatcher, queue, store, logger, metrics });
 * const result = await orchestrator.send({ subject: 'Hi', message: 'Body', recipients: ['a@b.co'] });
 * ```
 */

import { randomUUID } from 'crypto';
import { RelayExhaustedError, getErrorMessage } from '../errors/app-errors.js';
import type { RecipientStore } from '../repositories/recipient.repository.js';
import type { DispatchMode, OutboundEmail, SendEmailRequest, SendEmailResult } from '../types/email.types.js';
import type { DispatchQueue } from './dispatch-queue.service.js';
import type { EmailDispatcher } from './email-dispatcher.service.js';
import { emailValidationService } from './email-validation.service.js';
import type { StructuredLogger } from './logger.service.js';
import { formatMessage } from './message-formatter.service.js';
import type { MetricsService } from './metrics.service.js';

export interface EmailOrchestratorDeps {
  mode: DispatchMode;
  senderEmail: string;
  dispatcher: EmailDispatcher;
  queue: DispatchQueue;
  store: RecipientStore;
  logger: StructuredLogger;
  metrics: MetricsService;
  generateId?: () => string;
}

export class EmailOrchestrator {
  private readonly mode: DispatchMode;
  private readonly senderEmail: string;
  private readonly dispatcher: EmailDispatcher;
  private readonly queue: DispatchQueue;
  private readonly store: RecipientStore;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsService;
  private readonly generateId: () => string;

  constructor(deps: EmailOrchestratorDeps) {
    this.mode = deps.mode;
    this.senderEmail = deps.senderEmail;
    this.dispatcher = deps.dispatcher;
    this.queue = deps.queue;
    this.store = deps.store;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.generateId = deps.generateId ?? randomUUID;
  }

  getMode(): DispatchMode {
    return this.mode;
  }

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    const invalid = emailValidationService.findInvalid(request.recipients);
    if (invalid) {
      return {
        status: 'rejected',
        recipient: invalid.email,
        details: invalid.result.details ?? 'Invalid email',
      };
    }

    this.recordRecipients(request.recipients);

    const email: OutboundEmail = {
      dispatchId: this.generateId(),
      from: this.senderEmail,
      recipients: [...request.recipients],
      raw: formatMessage(request.recipients, request.subject ?? '', request.message ?? ''),
    };

    this.logger.emailAccepted({
      dispatchId: email.dispatchId,
      recipients: email.recipients.length,
      mode: this.mode,
    });

    if (this.mode === 'async') {
      this.queue.submit(email);
      return { status: 'accepted', dispatchId: email.dispatchId };
    }

    const outcome = await this.dispatcher.dispatch(email);

    if (outcome.status === 'delivered') {
      return {
        status: 'delivered',
        dispatchId: outcome.dispatchId,
        attempts: outcome.attempts.length,
      };
    }

    return {
      status: 'failed',
      dispatchId: outcome.dispatchId,
      error: new RelayExhaustedError(outcome.attempts.length, outcome.lastError),
    };
  }

  /**
   * Deduplication is best-effort: a store failure is logged and the send
   * goes ahead.
   */
  private recordRecipients(recipients: readonly string[]): void {
    for (const recipient of recipients) {
      try {
        if (this.store.insertIfAbsent(recipient)) {
          this.metrics.recordRecipient('new');
          this.logger.recipientRecorded({ email: recipient });
        } else {
          this.metrics.recordRecipient('seen');
        }
      } catch (error) {
        this.metrics.recordRecipient('error');
        this.logger.storeFailed({
          operation: 'insertIfAbsent',
          email: recipient,
          error: getErrorMessage(error),
        });
      }
    }
  }
}
