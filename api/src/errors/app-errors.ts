/**
 * Application error taxonomy
 *
 * Every error that crosses a module boundary is one of these. Errors that
 * reach the HTTP layer carry the status code they map to.
 */

export type AppErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'METHOD_NOT_ALLOWED'
  | 'RELAY_UNREACHABLE'
  | 'RELAY_REJECTED'
  | 'RELAY_EXHAUSTED'
  | 'STORE_ERROR';

export abstract class AppError extends Error {
  abstract readonly code: AppErrorCode;
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

/**
 * Missing or invalid environment configuration. Fatal at startup.
 */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`, 500);
    this.problems = problems;
  }
}

/**
 * Malformed request body or schema violation
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string) {
    super(message, 400);
  }
}

export class MethodNotAllowedError extends AppError {
  readonly code = 'METHOD_NOT_ALLOWED';
  readonly allowed: string;

  constructor(allowed: string) {
    super(`Only ${allowed} method is allowed`, 405);
    this.allowed = allowed;
  }
}

/**
 * A single send-once failure. Retried by the dispatcher.
 */
export abstract class RelayTransientError extends AppError {
  abstract readonly code: 'RELAY_UNREACHABLE' | 'RELAY_REJECTED';
  /** nodemailer error code, e.g. ECONNECTION or EAUTH */
  readonly relayCode?: string;

  constructor(message: string, relayCode?: string, options?: { cause?: unknown }) {
    super(message, 502, options);
    this.relayCode = relayCode;
  }
}

export class RelayUnreachableError extends RelayTransientError {
  readonly code = 'RELAY_UNREACHABLE';
}

export class RelayRejectedError extends RelayTransientError {
  readonly code = 'RELAY_REJECTED';
  /** SMTP reply code returned by the relay */
  readonly responseCode?: number;

  constructor(message: string, relayCode?: string, responseCode?: number, options?: { cause?: unknown }) {
    super(message, relayCode, options);
    this.responseCode = responseCode;
  }
}

/**
 * Retry budget spent without delivery
 */
export class RelayExhaustedError extends AppError {
  readonly code = 'RELAY_EXHAUSTED';
  readonly attempts: number;
  readonly lastError: RelayTransientError;

  constructor(attempts: number, lastError: RelayTransientError) {
    super(`Failed to send email after ${attempts} attempts: ${lastError.message}`, 500, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Idempotency store read/write failure. Never blocks delivery.
 */
export class StoreError extends AppError {
  readonly code = 'STORE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, options);
  }
}

// SMTP-level codes nodemailer raises once a connection is established
const REJECTION_CODES = new Set(['EAUTH', 'EENVELOPE', 'EMESSAGE', 'EPROTOCOL']);

/**
 * Maps anything a relay transport throws onto the transient error pair.
 * Errors carrying an SMTP reply code, or an SMTP-level nodemailer code, are
 * rejections; everything else means the relay could not be reached.
 */
export function toRelayError(error: unknown): RelayTransientError {
  if (error instanceof RelayTransientError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  let relayCode: string | undefined;
  let responseCode: number | undefined;

  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'string') {
      relayCode = error.code;
    }
    if ('responseCode' in error && typeof error.responseCode === 'number') {
      responseCode = error.responseCode;
    }
  }

  if (responseCode !== undefined || (relayCode !== undefined && REJECTION_CODES.has(relayCode))) {
    return new RelayRejectedError(message, relayCode, responseCode, { cause: error });
  }

  return new RelayUnreachableError(message, relayCode, { cause: error });
}

/**
 * Extracts a loggable message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
