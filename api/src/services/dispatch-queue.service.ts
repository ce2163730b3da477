import Bottleneck from 'bottleneck';
import type { OutboundEmail } from '../types/email.types.js';
import type { EmailDispatcher } from './email-dispatcher.service.js';
import type { StructuredLogger } from './logger.service.js';
import type { MetricsService } from './metrics.service.js';

export interface DispatchQueueConfig {
  /** Maximum background dispatches running at once; 0 = unlimited */
  maxConcurrent: number;
  /** Poll interval used by waitForIdle */
  idlePollMs?: number;
}

export interface DispatchQueueCounts {
  queued: number;
  running: number;
  done: number;
  failed: number;
}

/**
 * Dispatch Queue
 *
 * Fire-and-forget execution of dispatches, backed by Bottleneck.
 * submit() returns before the first relay attempt; the outcome is only
 * observable through the dispatcher's observer (logs and metrics).
 */
export class DispatchQueue {
  private limiter: Bottleneck;
  private inFlight = 0;
  private done = 0;
  private failed = 0;
  private idlePollMs: number;

  constructor(
    private readonly dispatcher: EmailDispatcher,
    private readonly logger: StructuredLogger,
    private readonly metrics: MetricsService,
    config: DispatchQueueConfig
  ) {
    this.idlePollMs = config.idlePollMs ?? 100;
    this.limiter = new Bottleneck({
      maxConcurrent: config.maxConcurrent > 0 ? config.maxConcurrent : null,
    });

    this.limiter.on('error', (error: unknown) => {
      this.logger.error('Dispatch queue error', { error });
    });
  }

  /**
   * Hands a dispatch to the queue and returns immediately
   */
  submit(email: OutboundEmail): void {
    this.inFlight++;

    void this.limiter
      .schedule({ id: email.dispatchId }, () => this.dispatcher.dispatch(email))
      .then((outcome) => {
        this.done++;
        this.logger.debug('Background dispatch finished', {
          dispatchId: outcome.dispatchId,
          status: outcome.status,
          attempts: outcome.attempts.length,
        });
      })
      .catch((error: unknown) => {
        this.failed++;
        this.logger.error('Background dispatch crashed', {
          dispatchId: email.dispatchId,
          error,
        });
      })
      .finally(() => {
        this.inFlight--;
        this.updateQueueSize();
      });

    this.updateQueueSize();
  }

  getCounts(): DispatchQueueCounts {
    const counts = this.limiter.counts();
    return {
      queued: counts.RECEIVED + counts.QUEUED,
      running: counts.RUNNING + counts.EXECUTING,
      done: this.done,
      failed: this.failed,
    };
  }

  /**
   * True once every submitted dispatch has settled, including its
   * completion bookkeeping
   */
  isIdle(): boolean {
    return this.inFlight === 0;
  }

  /**
   * Resolves once no dispatch is queued or running.
   * Used during graceful shutdown.
   */
  async waitForIdle(): Promise<void> {
    if (this.isIdle()) {
      return;
    }

    return new Promise((resolve) => {
      const checkIdle = () => {
        if (this.isIdle()) {
          resolve();
        } else {
          setTimeout(checkIdle, this.idlePollMs);
        }
      };
      checkIdle();
    });
  }

  /**
   * Stops accepting dispatches. Queued ones still run.
   */
  async stop(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: false });
  }

  private updateQueueSize(): void {
    this.metrics.setQueueSize(this.inFlight);
  }
}
