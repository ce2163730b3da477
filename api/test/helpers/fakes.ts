/**
 * In-process stand-ins shared by the unit tests
 */

import { RelayUnreachableError } from '../../src/errors/app-errors.js';
import type { RelayClient, RelayEnvelope, RelayMetrics, RelaySendResult } from '../../src/providers/relay-client.interface.js';
import type {
  AttemptEvent,
  DeliveredEvent,
  DispatchObserver,
  ExhaustedEvent,
  RetryEvent,
} from '../../src/services/email-dispatcher.service.js';
import { createLogger } from '../../src/services/logger.service.js';
import type { StructuredLogger } from '../../src/services/logger.service.js';

export function silentLogger(): StructuredLogger {
  return createLogger({ level: 'silent', nodeEnv: 'test' });
}

export type RelayBehaviour = (call: number, envelope: RelayEnvelope) => Promise<RelaySendResult>;

/**
 * Relay whose result for each call is decided by a function of the call number (1-based)
 */
export class FakeRelay implements RelayClient {
  calls = 0;
  envelopes: RelayEnvelope[] = [];
  closed = false;

  constructor(private readonly behaviour: RelayBehaviour) {}

  async sendOnce(envelope: RelayEnvelope): Promise<RelaySendResult> {
    this.calls++;
    this.envelopes.push(envelope);
    return this.behaviour(this.calls, envelope);
  }

  getName(): string {
    return 'fake';
  }

  getMetrics(): RelayMetrics {
    return {
      totalRequests: this.calls,
      successfulRequests: 0,
      failedRequests: 0,
      failuresByCode: {},
      lastRequestAt: null,
    };
  }

  close(): void {
    this.closed = true;
  }
}

export function relayFailure(message: string): RelaySendResult {
  return { ok: false, error: new RelayUnreachableError(message, 'ECONNECTION') };
}

/** Fails the first `failures` calls, then succeeds */
export function failingThenSucceeding(failures: number): FakeRelay {
  return new FakeRelay(async (call) =>
    call <= failures ? relayFailure(`relay down ${call}`) : { ok: true, messageId: `<msg-${call}@relay>` }
  );
}

export function alwaysFailing(): FakeRelay {
  return new FakeRelay(async (call) => relayFailure(`relay down ${call}`));
}

export function alwaysSucceeding(): FakeRelay {
  return new FakeRelay(async (call) => ({ ok: true, messageId: `<msg-${call}@relay>` }));
}

export class RecordingObserver implements DispatchObserver {
  attempts: AttemptEvent[] = [];
  retries: RetryEvent[] = [];
  delivered: DeliveredEvent[] = [];
  exhausted: ExhaustedEvent[] = [];

  onAttempt(event: AttemptEvent): void {
    this.attempts.push(event);
  }

  onRetry(event: RetryEvent): void {
    this.retries.push(event);
  }

  onDelivered(event: DeliveredEvent): void {
    this.delivered.push(event);
  }

  onExhausted(event: ExhaustedEvent): void {
    this.exhausted.push(event);
  }
}

/**
 * Sleep that returns immediately and records the requested delays
 */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
