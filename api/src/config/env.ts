import dotenv from 'dotenv';
import { isValidEmail } from '../services/email-validation.service.js';
import { ConfigurationError } from '../errors/app-errors.js';
import type { DispatchMode } from '../types/email.types.js';

/**
 * SMTP relay credentials. Immutable for the lifetime of the process.
 */
export interface RelayCredentials {
  readonly senderEmail: string;
  readonly password: string;
  readonly smtpServer: string;
  readonly smtpPort: number;
}

export interface Config {
  readonly port: number;
  readonly host: string;
  readonly nodeEnv: string;
  readonly logLevel: string;
  readonly enableDocs: boolean;
  readonly relay: RelayCredentials;
  readonly dispatchMode: DispatchMode;
  readonly maxRetries: number;
  readonly retryBaseDelayMs: number;
  /** 0 means no cap on concurrent background dispatches */
  readonly dispatchConcurrency: number;
  readonly databasePath: string;
  readonly shutdownTimeoutMs: number;
  readonly forceShutdownTimeoutMs: number;
}

const REQUIRED_VARIABLES = ['SENDER_EMAIL', 'EMAIL_PASSWORD', 'SMTP_SERVER', 'SMTP_PORT'] as const;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Loads .env from the working directory. Variables already set win.
 */
export function loadEnvFile(): void {
  dotenv.config();
}

/**
 * Builds the typed configuration from an environment map.
 * Collects every problem before throwing a single ConfigurationError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const problems: string[] = [];

  const missing = REQUIRED_VARIABLES.filter((name) => !env[name]);
  if (missing.length > 0) {
    problems.push(`missing required environment variables: ${missing.join(', ')}`);
  }

  const senderEmail = env.SENDER_EMAIL ?? '';
  if (senderEmail && !isValidEmail(senderEmail)) {
    problems.push('SENDER_EMAIL is not a valid email address');
  }

  let smtpPort = 0;
  if (env.SMTP_PORT) {
    const port = Number(env.SMTP_PORT);
    if (Number.isInteger(port) && port >= 1 && port <= 65535) {
      smtpPort = port;
    } else {
      problems.push(`SMTP_PORT must be an integer between 1 and 65535, got "${env.SMTP_PORT}"`);
    }
  }

  const dispatchMode = env.DISPATCH_MODE || 'sync';
  if (dispatchMode !== 'sync' && dispatchMode !== 'async') {
    problems.push(`DISPATCH_MODE must be "sync" or "async", got "${dispatchMode}"`);
  }

  const nodeEnv = env.NODE_ENV || 'development';
  const logLevel = env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug');
  if (!LOG_LEVELS.includes(logLevel)) {
    problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
  }

  const config: Config = {
    port: parseInteger('PORT', env.PORT, 8080, problems),
    host: env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel,
    enableDocs: env.ENABLE_DOCS !== 'false', // enabled by default
    relay: Object.freeze({
      senderEmail,
      password: env.EMAIL_PASSWORD ?? '',
      smtpServer: env.SMTP_SERVER ?? '',
      smtpPort,
    }),
    dispatchMode: dispatchMode === 'async' ? 'async' : 'sync',
    maxRetries: parseInteger('MAX_RETRIES', env.MAX_RETRIES, 3, problems, 1),
    retryBaseDelayMs: parseInteger('RETRY_BASE_DELAY_MS', env.RETRY_BASE_DELAY_MS, 1000, problems),
    dispatchConcurrency: parseInteger('DISPATCH_CONCURRENCY', env.DISPATCH_CONCURRENCY, 0, problems),
    databasePath: env.DATABASE_PATH || './data/recipients.db',
    shutdownTimeoutMs: parseInteger('SHUTDOWN_TIMEOUT_MS', env.SHUTDOWN_TIMEOUT_MS, 30000, problems), // 30 seconds
    forceShutdownTimeoutMs: parseInteger('FORCE_SHUTDOWN_TIMEOUT_MS', env.FORCE_SHUTDOWN_TIMEOUT_MS, 60000, problems), // 60 seconds
  };

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }

  return Object.freeze(config);
}

function parseInteger(
  name: string,
  raw: string | undefined,
  fallback: number,
  problems: string[],
  min = 0
): number {
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${name} must be an integer >= ${min}, got "${raw}"`);
    return fallback;
  }

  return value;
}
