import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { STATUS_CODES } from 'http';
import { AppError, MethodNotAllowedError, ValidationError } from './errors/app-errors.js';
import type { RelayClient } from './providers/relay-client.interface.js';
import type { RecipientStore } from './repositories/recipient.repository.js';
import { emailRoutes } from './routes/email.routes.js';
import { healthRoutes } from './routes/health.routes.js';
import type { DispatchQueue } from './services/dispatch-queue.service.js';
import type { EmailOrchestrator } from './services/email-orchestrator.service.js';
import type { StructuredLogger } from './services/logger.service.js';
import type { MetricsService } from './services/metrics.service.js';
import type { RetryPolicyService } from './services/retry-policy.service.js';

export interface AppOptions {
  logLevel: string;
  nodeEnv: string;
  enableDocs: boolean;
  orchestrator: EmailOrchestrator;
  store: RecipientStore;
  queue: DispatchQueue;
  relay: RelayClient;
  retryPolicy: RetryPolicyService;
  metrics: MetricsService;
  logger: StructuredLogger;
  /** Returns false once shutdown has started */
  isAcceptingNewWork?: () => boolean;
}

/**
 * Builds the Fastify instance with every route registered.
 * Does not listen.
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { orchestrator, store, queue, relay, retryPolicy, metrics, logger } = options;
  const isAcceptingNewWork = options.isAcceptingNewWork ?? (() => true);

  const fastify = Fastify({
    logger: options.nodeEnv === 'development' ? {
      level: options.logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    } : { level: options.logLevel },
  });

  // Metrics tracking
  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? request.url;
    metrics.recordApiRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  // Reject new send requests during shutdown
  fastify.addHook('onRequest', async (request, reply) => {
    if (!isAcceptingNewWork() && request.url.startsWith('/send-email') && request.method === 'POST') {
      return reply.code(503).send({
        error: 'Service Unavailable',
        message: 'Server is shutting down. Not accepting new email requests.',
      });
    }
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof MethodNotAllowedError) {
      return reply.code(405).header('Allow', error.allowed).send({
        error: 'Method Not Allowed',
        message: error.message,
      });
    }

    // Malformed JSON and schema violations raised by Fastify
    const appError = !(error instanceof AppError) && (error.validation || error.statusCode === 400)
      ? new ValidationError(error.message)
      : error;

    if (appError instanceof AppError) {
      if (appError.statusCode >= 500) {
        logger.error('Request failed', { error: appError, code: appError.code, method: request.method, url: request.url });
      }
      return reply.code(appError.statusCode).send({
        error: STATUS_CODES[appError.statusCode] ?? 'Error',
        message: appError.message,
      });
    }

    // Other client errors (unsupported media type, body too large)
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({
        error: STATUS_CODES[statusCode] ?? 'Bad Request',
        message: error.message,
      });
    }

    logger.error('Unhandled request error', { error, method: request.method, url: request.url });
    return reply.code(500).send({
      error: 'Internal Server Error',
      message: 'Unexpected error',
    });
  });

  // Swagger must see the routes as they are added
  if (options.enableDocs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'Relay Mailer API',
          description: 'Validates recipients and sends email through an SMTP relay with bounded retry and exponential backoff',
          version: '1.0.0',
        },
        tags: [
          { name: 'Email', description: 'Email sending and recorded recipients' },
          { name: 'Health', description: 'Health and monitoring endpoints' },
        ],
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  await fastify.register(emailRoutes, { orchestrator, store });
  await fastify.register(healthRoutes, { store, queue, relay, retryPolicy, orchestrator, metrics, logger });

  await fastify.ready();
  return fastify;
}
