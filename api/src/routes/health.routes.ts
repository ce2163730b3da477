import type { FastifyInstance } from 'fastify';
import type { RelayClient } from '../providers/relay-client.interface.js';
import type { RecipientStore } from '../repositories/recipient.repository.js';
import type { DispatchQueue } from '../services/dispatch-queue.service.js';
import type { EmailOrchestrator } from '../services/email-orchestrator.service.js';
import type { StructuredLogger } from '../services/logger.service.js';
import type { MetricsService } from '../services/metrics.service.js';
import type { RetryPolicyService } from '../services/retry-policy.service.js';

export interface HealthRoutesOptions {
  store: RecipientStore;
  queue: DispatchQueue;
  relay: RelayClient;
  retryPolicy: RetryPolicyService;
  orchestrator: EmailOrchestrator;
  metrics: MetricsService;
  logger: StructuredLogger;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
  const { store, queue, relay, retryPolicy, orchestrator, metrics, logger } = options;

  // Health check endpoint
  fastify.get('/health', {
    schema: {
      description: 'Health check endpoint - verifies the recipient store and reports dispatch settings, the dispatch queue and relay counters',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    const start = Date.now();
    const storeUp = store.ping();

    const health = {
      status: storeUp ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      store: {
        status: storeUp ? 'connected' : 'disconnected',
        responseTime: Date.now() - start,
      },
      dispatch: {
        mode: orchestrator.getMode(),
        ...retryPolicy.getConfig(),
      },
      dispatchQueue: queue.getCounts(),
      relay: {
        name: relay.getName(),
        ...relay.getMetrics(),
      },
    };

    if (!storeUp) {
      logger.warn('Recipient store health check failed');
    }

    reply.code(storeUp ? 200 : 503);
    return health;
  });

  // Metrics endpoint
  fastify.get('/metrics', {
    schema: {
      description: 'Prometheus metrics endpoint - returns metrics in Prometheus text format',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    const output = await metrics.getMetrics();
    reply.type(metrics.getContentType());
    return output;
  });
}
