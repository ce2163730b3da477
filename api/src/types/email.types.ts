/**
 * Email dispatch types
 */

import type { RelayExhaustedError, RelayTransientError } from '../errors/app-errors.js';

/**
 * Body of POST /send-email
 */
export interface SendEmailRequest {
  subject?: string;
  message?: string;
  recipients: string[];
}

/**
 * A formatted message ready for the relay
 */
export interface OutboundEmail {
  dispatchId: string;
  from: string;
  recipients: readonly string[];
  raw: Buffer;
}

/**
 * One send-once call against the relay. Not persisted.
 */
export interface DispatchAttempt {
  /** 1-based */
  attempt: number;
  outcome: 'success' | 'failure';
  error?: RelayTransientError;
  /** Backoff slept before this attempt (0 for the first) */
  backoffBeforeMs: number;
}

export type DispatchOutcome =
  | {
      status: 'delivered';
      dispatchId: string;
      attempts: DispatchAttempt[];
      messageId?: string;
    }
  | {
      status: 'exhausted';
      dispatchId: string;
      attempts: DispatchAttempt[];
      lastError: RelayTransientError;
    };

/**
 * Whether the handler waits for the dispatch outcome
 */
export type DispatchMode = 'sync' | 'async';

/**
 * Result of handling one SendEmailRequest
 */
export type SendEmailResult =
  | { status: 'rejected'; recipient: string; details: string }
  | { status: 'accepted'; dispatchId: string }
  | { status: 'delivered'; dispatchId: string; attempts: number }
  | { status: 'failed'; dispatchId: string; error: RelayExhaustedError };

/**
 * A row of the recipient store
 */
export interface SeenRecipient {
  id: number;
  email: string;
  createdAt: string;
}
