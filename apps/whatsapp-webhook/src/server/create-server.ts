import helmet from '@fastify/helmet';
import fastifyRateLimit, { type RateLimitPluginOptions } from '@fastify/rate-limit';
import Fastify, {
  type FastifyPluginAsync,
  type FastifyTypeProviderDefault,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';

import type { AppConfig } from '../config';
import { InvalidJsonBodyError, inferStatusCode } from '../errors';
import { registerHealthRoutes } from '../routes/health';
import { registerSendMessageRoutes } from '../routes/send-message';
import { registerWebhookRoutes } from '../routes/webhook';
import type { SendMessageTool } from '../services/whatsapp/send-message-tool';
import type { WhatsAppWebhookService } from '../services/whatsapp/webhook-service';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';

import type { GatewayFastifyInstance } from './types';

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  webhookService: WhatsAppWebhookService;
  sendMessageTool: SendMessageTool;
}

/**
 * Build and configure the Fastify HTTP server responsible for exposing the
 * WhatsApp webhook, the direct-send tool, health checks, metrics, and the
 * operational middleware (helmet, rate limiting, correlation IDs).
 */
export async function createServer(options: ServerOptions): Promise<GatewayFastifyInstance> {
  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression<RawServerDefault>,
    RawReplyDefaultExpression<RawServerDefault>,
    AppLogger,
    FastifyTypeProviderDefault
  >({
    logger: options.logger,
    disableRequestLogging: options.config.env === 'production',
  });

  // Every body is read as bytes and parsed as JSON whatever its declared type.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (request, payload, done) => {
    const buffer = Buffer.isBuffer(payload) ? payload : Buffer.from(payload);
    request.rawBody = buffer;

    if (buffer.length === 0) {
      done(null, {});
      return;
    }

    try {
      done(null, JSON.parse(buffer.toString('utf8')));
    } catch (error) {
      request.log.warn({ error }, 'Rejected request body that is not valid JSON');
      done(new InvalidJsonBodyError('Bad Request', error), undefined);
    }
  });

  app.setErrorHandler((error, request, reply) => {
    const statusCode = inferStatusCode(error);

    if (statusCode >= 500) {
      request.log.error({ error }, 'Unhandled error while processing request');
    }

    const message = statusCode === 500 ? 'Internal Server Error' : error.message;
    return reply.code(statusCode).type('text/plain').send(message);
  });

  await app.register(helmet, {
    global: true,
  });

  await app.register(fastifyRateLimit as unknown as FastifyPluginAsync<RateLimitPluginOptions>, {
    global: false,
    max: options.config.rateLimit.max,
    timeWindow: options.config.rateLimit.timeWindow,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      firstHeader(request.headers['x-request-id']) ||
      firstHeader(request.headers['x-correlation-id']) ||
      request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  const rateLimit = {
    max: options.config.rateLimit.max,
    timeWindow: options.config.rateLimit.timeWindow,
  };

  await registerHealthRoutes(app);
  await registerWebhookRoutes(app, {
    verifyToken: options.config.whatsapp.verifyToken,
    service: options.webhookService,
    metrics: options.metrics,
    rateLimit,
  });
  await registerSendMessageRoutes(app, {
    tool: options.sendMessageTool,
    apiKey: options.config.tools.apiKey,
    rateLimit,
  });

  app.get('/metrics', async (_, reply) => {
    const payload = await options.metrics.registry.metrics();
    return reply.type(options.metrics.registry.contentType).send(payload);
  });

  return app;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
