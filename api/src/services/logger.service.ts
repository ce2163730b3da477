/**
 * Structured Logger Service
 *
 * JSON logging with a fixed set of dispatch events. The dispatch events are
 * the observability sink for background sends: in async mode they are the
 * only place a terminal outcome is visible.
 *
 * Common fields:
 * - timestamp: ISO 8601 timestamp
 * - level: log level (info, warn, error, debug)
 * - event: event name (dispatch.retry, dispatch.exhausted, ...)
 * - dispatchId: correlation id of one send request (when applicable)
 * - attempts: number of attempts (when applicable)
 * - error_code: error code (when applicable)
 * - message: human-readable message
 */

import pino from 'pino';

export interface LogContext {
  dispatchId?: string;
  email?: string;
  status?: string;
  attempts?: number;
  error_code?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: string;
  nodeEnv: string;
  service?: string;
}

export function createPinoLogger(options: LoggerOptions): pino.Logger {
  return pino({
    level: options.level,

    formatters: {
      level: (label) => {
        return { level: label };
      },
    },

    // Base fields included in every log
    base: {
      service: options.service ?? 'relay-mailer-api',
      environment: options.nodeEnv,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    // Pretty print in development
    transport: options.nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    } : undefined,
  });
}

export class StructuredLogger {
  private logger: pino.Logger;

  constructor(logger: pino.Logger) {
    this.logger = logger;
  }

  /**
   * Logs a send request that passed validation
   */
  emailAccepted(context: LogContext & { dispatchId: string; recipients: number; mode: string }) {
    this.logger.info({
      event: 'email.accepted',
      dispatchId: context.dispatchId,
      recipients: context.recipients,
      mode: context.mode,
      message: `Email accepted for ${context.recipients} recipient(s) (${context.mode})`,
    });
  }

  /**
   * Logs a send-once call about to be made
   */
  dispatchAttempt(context: LogContext & { dispatchId: string; attempt: number }) {
    this.logger.debug({
      event: 'dispatch.attempt',
      dispatchId: context.dispatchId,
      attempts: context.attempt,
      status: 'SENDING',
      message: `Dispatch ${context.dispatchId} attempt ${context.attempt}`,
    });
  }

  /**
   * Logs a failed attempt that will be retried
   */
  dispatchRetry(context: LogContext & { dispatchId: string; attempt: number; error: string; nextDelay: string; nextDelayMs: number }) {
    this.logger.warn({
      event: 'dispatch.retry',
      dispatchId: context.dispatchId,
      attempts: context.attempt,
      status: 'RETRYING',
      error_code: context.error_code,
      error: context.error,
      nextDelayMs: context.nextDelayMs,
      message: `Attempt ${context.attempt} failed, retrying in ${context.nextDelay}... (${context.error})`,
    });
  }

  /**
   * Logs delivery
   */
  dispatchDelivered(context: LogContext & { dispatchId: string; attempts: number; messageId?: string }) {
    this.logger.info({
      event: 'dispatch.delivered',
      dispatchId: context.dispatchId,
      status: 'DELIVERED',
      attempts: context.attempts,
      messageId: context.messageId,
      duration: context.duration,
      message: `Email sent successfully (${context.attempts} attempt(s))`,
    });
  }

  /**
   * Logs retry budget exhaustion (terminal failure)
   */
  dispatchExhausted(context: LogContext & { dispatchId: string; attempts: number; error: string }) {
    this.logger.error({
      event: 'dispatch.exhausted',
      dispatchId: context.dispatchId,
      status: 'EXHAUSTED',
      attempts: context.attempts,
      error_code: context.error_code,
      error: context.error,
      duration: context.duration,
      message: `Failed to send email after ${context.attempts} attempts - ${context.error}`,
    });
  }

  recipientRecorded(context: LogContext & { email: string }) {
    this.logger.debug({
      event: 'recipient.recorded',
      email: context.email,
      message: `Recipient recorded: ${context.email}`,
    });
  }

  /**
   * Logs a recipient store failure. Delivery continues.
   */
  storeFailed(context: LogContext & { operation: string; error: string }) {
    this.logger.warn({
      event: 'store.failed',
      operation: context.operation,
      email: context.email,
      error: context.error,
      message: `Recipient store ${context.operation} failed: ${context.error}`,
    });
  }

  shutdownStarted(context: { signal: string }) {
    this.logger.warn({
      event: 'shutdown.started',
      signal: context.signal,
      message: `Graceful shutdown initiated (${context.signal})`,
    });
  }

  shutdownCompleted(context: { duration: number }) {
    this.logger.info({
      event: 'shutdown.completed',
      duration: context.duration,
      message: `Graceful shutdown completed (${context.duration}ms)`,
    });
  }

  info(message: string, context?: LogContext) {
    this.logger.info({ ...context, message });
  }

  warn(message: string, context?: LogContext) {
    this.logger.warn({ ...context, message });
  }

  error(message: string, context?: LogContext & { error?: unknown }) {
    const error = context?.error;
    this.logger.error({
      ...context,
      error: error instanceof Error ? error.message : error,
      stack: error instanceof Error ? error.stack : undefined,
      message,
    });
  }

  debug(message: string, context?: LogContext) {
    this.logger.debug({ ...context, message });
  }
}

export function createLogger(options: LoggerOptions): StructuredLogger {
  return new StructuredLogger(createPinoLogger(options));
}
