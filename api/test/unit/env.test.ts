import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/config/env.js';
import { ConfigurationError } from '../../src/errors/app-errors.js';

const baseEnv = {
  SENDER_EMAIL: 'sender@example.com',
  EMAIL_PASSWORD: 'test-secret',
  SMTP_SERVER: 'smtp.example.com',
  SMTP_PORT: '587',
};

function problemsFor(env: NodeJS.ProcessEnv): readonly string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.problems;
    }
    throw error;
  }
  return [];
}

describe('Configuration', () => {
  it('should load the relay credentials', () => {
    const config = loadConfig({ ...baseEnv });

    expect(config.relay).toEqual({
      senderEmail: 'sender@example.com',
      password: 'test-secret',
      smtpServer: 'smtp.example.com',
      smtpPort: 587,
    });
  });

  it('should apply defaults for optional settings', () => {
    const config = loadConfig({ ...baseEnv });

    expect(config).toMatchObject({
      port: 8080,
      host: '0.0.0.0',
      nodeEnv: 'development',
      logLevel: 'debug',
      enableDocs: true,
      dispatchMode: 'sync',
      maxRetries: 3,
      retryBaseDelayMs: 1000,
      dispatchConcurrency: 0,
      databasePath: './data/recipients.db',
      shutdownTimeoutMs: 30000,
      forceShutdownTimeoutMs: 60000,
    });
  });

  it('should default to info logging in production', () => {
    expect(loadConfig({ ...baseEnv, NODE_ENV: 'production' }).logLevel).toBe('info');
  });

  it('should read overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      PORT: '3000',
      DISPATCH_MODE: 'async',
      MAX_RETRIES: '5',
      RETRY_BASE_DELAY_MS: '250',
      DISPATCH_CONCURRENCY: '4',
      ENABLE_DOCS: 'false',
    });

    expect(config).toMatchObject({
      port: 3000,
      dispatchMode: 'async',
      maxRetries: 5,
      retryBaseDelayMs: 250,
      dispatchConcurrency: 4,
      enableDocs: false,
    });
  });

  it('should return a frozen configuration', () => {
    const config = loadConfig({ ...baseEnv });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.relay)).toBe(true);
  });

  it.each(['SENDER_EMAIL', 'EMAIL_PASSWORD', 'SMTP_SERVER', 'SMTP_PORT'])(
    'should fail when %s is missing',
    (name) => {
      const env: NodeJS.ProcessEnv = { ...baseEnv };
      delete env[name];

      expect(() => loadConfig(env)).toThrow(ConfigurationError);
      expect(problemsFor(env)).toEqual([`missing required environment variables: ${name}`]);
    }
  );

  it('should treat an empty value as missing', () => {
    expect(problemsFor({ ...baseEnv, EMAIL_PASSWORD: '' })).toEqual([
      'missing required environment variables: EMAIL_PASSWORD',
    ]);
  });

  it('should list every missing variable at once', () => {
    expect(problemsFor({})).toEqual([
      'missing required environment variables: SENDER_EMAIL, EMAIL_PASSWORD, SMTP_SERVER, SMTP_PORT',
    ]);
  });

  it('should reject a sender that is not an email address', () => {
    expect(problemsFor({ ...baseEnv, SENDER_EMAIL: 'not-an-email' })).toEqual([
      'SENDER_EMAIL is not a valid email address',
    ]);
  });

  it.each(['abc', '0', '65536', '25.5'])('should reject SMTP_PORT %s', (port) => {
    expect(problemsFor({ ...baseEnv, SMTP_PORT: port })).toEqual([
      `SMTP_PORT must be an integer between 1 and 65535, got "${port}"`,
    ]);
  });

  it('should reject an unknown dispatch mode', () => {
    expect(problemsFor({ ...baseEnv, DISPATCH_MODE: 'later' })).toEqual([
      'DISPATCH_MODE must be "sync" or "async", got "later"',
    ]);
  });

  it('should reject a retry budget below one', () => {
    expect(problemsFor({ ...baseEnv, MAX_RETRIES: '0' })).toEqual([
      'MAX_RETRIES must be an integer >= 1, got "0"',
    ]);
  });

  it('should collect problems from several variables', () => {
    const problems = problemsFor({ ...baseEnv, SMTP_PORT: 'x', DISPATCH_MODE: 'later' });

    expect(problems).toHaveLength(2);
  });
});
