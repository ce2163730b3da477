import nodemailer from 'nodemailer';
import type { RelayCredentials } from '../config/env.js';
import { toRelayError } from '../errors/app-errors.js';
import type {
  RelayClient,
  RelayEnvelope,
  RelayMetrics,
  RelaySendResult,
} from './relay-client.interface.js';

/**
 * The part of a nodemailer transporter this provider uses
 */
export interface MailTransport {
  sendMail(mail: {
    envelope: { from: string; to: string[] };
    raw: Buffer;
  }): Promise<{ messageId?: string; response?: string }>;
  close(): void;
}

/**
 * SMTP Relay Provider
 *
 * Sends a preformatted message through an SMTP relay with AUTH PLAIN.
 * Port 465 uses implicit TLS; other ports upgrade with STARTTLS when the
 * relay offers it.
 */
export class SmtpRelayProvider implements RelayClient {
  private transport: MailTransport;
  private metrics: RelayMetrics;

  constructor(credentials: RelayCredentials, transport?: MailTransport) {
    this.transport = transport ?? nodemailer.createTransport({
      host: credentials.smtpServer,
      port: credentials.smtpPort,
      secure: credentials.smtpPort === 465,
      auth: {
        user: credentials.senderEmail,
        pass: credentials.password,
      },
      authMethod: 'PLAIN',
    });

    this.metrics = {
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      failuresByCode: {},
      lastRequestAt: null,
    };
  }

  async sendOnce(envelope: RelayEnvelope): Promise<RelaySendResult> {
    this.metrics.totalRequests++;
    this.metrics.lastRequestAt = Date.now();

    try {
      const info = await this.transport.sendMail({
        envelope: { from: envelope.from, to: [...envelope.recipients] },
        raw: envelope.raw,
      });

      this.metrics.successfulRequests++;
      return { ok: true, messageId: info.messageId, response: info.response };
    } catch (error) {
      const relayError = toRelayError(error);
      const code = relayError.relayCode ?? relayError.code;

      this.metrics.failedRequests++;
      this.metrics.failuresByCode[code] = (this.metrics.failuresByCode[code] ?? 0) + 1;

      return { ok: false, error: relayError };
    }
  }

  getMetrics(): RelayMetrics {
    return { ...this.metrics, failuresByCode: { ...this.metrics.failuresByCode } };
  }

  getName(): string {
    return 'smtp';
  }

  close(): void {
    this.transport.close();
  }
}
