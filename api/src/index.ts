import { buildApp } from './app.js';
import { loadConfig, loadEnvFile } from './config/env.js';
import type { Config } from './config/env.js';
import { ConfigurationError, StoreError } from './errors/app-errors.js';
import { SmtpRelayProvider } from './providers/smtp-relay.provider.js';
import { RecipientRepository } from './repositories/recipient.repository.js';
import { LoggingDispatchObserver } from './services/dispatch-observer.service.js';
import { DispatchQueue } from './services/dispatch-queue.service.js';
import { EmailDispatcher } from './services/email-dispatcher.service.js';
import { EmailOrchestrator } from './services/email-orchestrator.service.js';
import { createGracefulShutdown } from './services/graceful-shutdown.service.js';
import { createLogger } from './services/logger.service.js';
import { MetricsService } from './services/metrics.service.js';
import { RetryPolicyService } from './services/retry-policy.service.js';

// Track server state
let isAcceptingNewWork = true;

const start = async () => {
  loadEnvFile();

  const nodeEnv = process.env.NODE_ENV || 'development';
  const bootLogger = createLogger({ level: process.env.LOG_LEVEL || 'info', nodeEnv });

  // 1. Configuration must be complete before anything binds or connects
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      bootLogger.error('Configuration error, refusing to start', { error, problems: error.problems });
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });
  logger.info('Starting application', {
    dispatchMode: config.dispatchMode,
    smtpServer: config.relay.smtpServer,
    smtpPort: config.relay.smtpPort,
  });

  // 2. Recipient store (fatal if it cannot be opened)
  let store: RecipientRepository;
  try {
    store = RecipientRepository.open(config.databasePath);
  } catch (error) {
    if (error instanceof StoreError) {
      logger.error('Could not open recipient store', { error, databasePath: config.databasePath });
      process.exit(1);
    }
    throw error;
  }
  logger.info('Recipient store ready', { databasePath: config.databasePath, recipients: store.count() });

  // 3. Dispatch pipeline
  const metrics = new MetricsService();
  const relay = new SmtpRelayProvider(config.relay);
  const retryPolicy = new RetryPolicyService({
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseDelayMs,
  });
  logger.info('Relay client ready', { relay: relay.getName(), maxRetries: config.maxRetries });

  const dispatcher = new EmailDispatcher({
    relay,
    retryPolicy,
    observer: new LoggingDispatchObserver(logger, metrics, retryPolicy),
  });
  const queue = new DispatchQueue(dispatcher, logger, metrics, {
    maxConcurrent: config.dispatchConcurrency,
  });
  const orchestrator = new EmailOrchestrator({
    mode: config.dispatchMode,
    senderEmail: config.relay.senderEmail,
    dispatcher,
    queue,
    store,
    logger,
    metrics,
  });

  // 4. HTTP server
  const fastify = await buildApp({
    logLevel: config.logLevel,
    nodeEnv: config.nodeEnv,
    enableDocs: config.enableDocs,
    orchestrator,
    store,
    queue,
    relay,
    retryPolicy,
    metrics,
    logger,
    isAcceptingNewWork: () => isAcceptingNewWork,
  });

  // 5. Graceful shutdown
  const gracefulShutdown = createGracefulShutdown(logger, {
    timeout: config.shutdownTimeoutMs,
    forceTimeout: config.forceShutdownTimeoutMs,

    onShutdownStart: async () => {
      isAcceptingNewWork = false;
      await fastify.close();
    },

    onWaitForQueue: async () => {
      await queue.waitForIdle();
      await queue.stop();
    },

    onCleanup: () => {
      relay.close();
      store.close();
    },
  });

  gracefulShutdown.registerHandlers();

  try {
    await fastify.listen({ port: config.port, host: config.host });
    logger.info(`Server running on port ${config.port}`);
  } catch (error) {
    logger.error('Server start error', { error });
    store.close();
    process.exit(1);
  }
};

start().catch((error: unknown) => {
  console.error('Fatal startup error:', error);
  process.exit(1);
});
