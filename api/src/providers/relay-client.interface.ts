import type { RelayTransientError } from '../errors/app-errors.js';

/**
 * What one send-once call hands to the relay
 */
export interface RelayEnvelope {
  from: string;
  recipients: readonly string[];
  /** Fully formatted message (headers, blank line, body) */
  raw: Buffer;
}

/**
 * All-or-nothing result of one send-once call. Partial per-recipient
 * acceptance is not modelled: the relay either took the message for every
 * recipient or the call failed.
 */
export type RelaySendResult =
  | { ok: true; messageId?: string; response?: string }
  | { ok: false; error: RelayTransientError };

/**
 * Relay Client Interface
 *
 * Defines the contract the dispatcher retries against. Implementations
 * report failures through the result instead of throwing.
 */
export interface RelayClient {
  sendOnce(envelope: RelayEnvelope): Promise<RelaySendResult>;

  /**
   * Gets provider name (e.g., "smtp")
   */
  getName(): string;

  /**
   * Request counters since start, reported on /health
   */
  getMetrics(): RelayMetrics;

  close(): void;
}

/**
 * Relay request counters
 */
export interface RelayMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  failuresByCode: Record<string, number>;
  lastRequestAt: number | null;
}
