import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { MethodNotAllowedError } from '../errors/app-errors.js';
import type { RecipientStore } from '../repositories/recipient.repository.js';
import type { EmailOrchestrator } from '../services/email-orchestrator.service.js';
import type { SendEmailRequest } from '../types/email.types.js';

export interface EmailRoutesOptions {
  orchestrator: EmailOrchestrator;
  store: RecipientStore;
}

const errorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
  },
} as const;

function methodNotAllowed(allowed: string) {
  return async (_request: FastifyRequest, _reply: FastifyReply) => {
    throw new MethodNotAllowedError(allowed);
  };
}

export async function emailRoutes(fastify: FastifyInstance, options: EmailRoutesOptions) {
  const { orchestrator, store } = options;

  // POST /send-email - Validate recipients and dispatch through the relay
  fastify.post<{ Body: SendEmailRequest }>('/send-email', {
    schema: {
      description: 'Send an email to one or more recipients. Replies 200/500 once the relay outcome is known (sync mode) or 202 immediately (async mode).',
      tags: ['Email'],
      body: {
        type: 'object',
        required: ['recipients'],
        properties: {
          subject: { type: 'string' },
          message: { type: 'string' },
          recipients: {
            type: 'array',
            minItems: 1,
            items: { type: 'string' },
          },
        },
      },
      response: {
        400: { description: 'Malformed body or invalid recipient', ...errorSchema },
        500: {
          description: 'Relay retry budget exhausted',
          type: 'object',
          properties: {
            error: { type: 'string' },
            message: { type: 'string' },
            lastError: { type: 'string' },
          },
        },
      },
    },
  }, async (request, reply) => {
    const result = await orchestrator.send(request.body);

    switch (result.status) {
      case 'rejected':
        return reply.code(400).send({
          error: 'Invalid recipient',
          message: `Recipient email address '${result.recipient}' is not valid`,
        });

      case 'accepted':
        return reply.code(202).type('text/plain').send('Email is being processed');

      case 'delivered':
        return reply.code(200).type('text/plain').send('Email sent successfully');

      case 'failed':
        return reply.code(500).send({
          error: 'Delivery failed',
          message: 'Failed to send email after multiple attempts',
          lastError: result.error.lastError.message,
        });
    }
  });

  fastify.route({
    method: ['GET', 'HEAD', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    url: '/send-email',
    exposeHeadRoute: false,
    schema: { hide: true },
    handler: methodNotAllowed('POST'),
  });

  // GET /get-all-emails - List every recorded recipient
  fastify.get('/get-all-emails', {
    exposeHeadRoute: false,
    schema: {
      description: 'List every recipient address recorded by the store',
      tags: ['Email'],
      response: {
        200: {
          description: 'Recorded recipients in insertion order',
          type: 'array',
          items: {
            type: 'object',
            properties: {
              id: { type: 'number' },
              email: { type: 'string' },
              createdAt: { type: 'string' },
            },
          },
        },
        500: { description: 'Store read failed', ...errorSchema },
      },
    },
  }, async () => {
    return store.findAll();
  });

  fastify.route({
    method: ['POST', 'HEAD', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    url: '/get-all-emails',
    schema: { hide: true },
    handler: methodNotAllowed('GET'),
  });
}
