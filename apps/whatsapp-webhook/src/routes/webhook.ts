import { MethodNotAllowedError, inferStatusCode } from '../errors';
import type { GatewayFastifyInstance, RouteRateLimit } from '../server/types';
import { respondToVerification, type VerificationQuery } from '../services/whatsapp/verification';
import type { WhatsAppWebhookService } from '../services/whatsapp/webhook-service';
import type { GatewayMetrics } from '../telemetry/metrics';

export interface WebhookRouteContext {
  verifyToken: string;
  service: WhatsAppWebhookService;
  metrics: GatewayMetrics;
  rateLimit?: RouteRateLimit;
}

const UNSUPPORTED_METHODS = ['HEAD', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;

/**
 * Register the WhatsApp webhook routes: the GET subscription handshake, the
 * POST intake that always acknowledges with a plain `ok`, and 405 responses
 * for every other method.
 */
export async function registerWebhookRoutes(
  app: GatewayFastifyInstance,
  context: WebhookRouteContext,
): Promise<void> {
  app.get<{ Querystring: VerificationQuery }>(
    '/webhook',
    {
      exposeHeadRoute: false,
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const outcome = respondToVerification(request.query, context.verifyToken);

      if (outcome.statusCode !== 200) {
        request.log.warn({ mode: request.query['hub.mode'] }, 'Rejected WhatsApp verification request');
      }

      return reply.code(outcome.statusCode).type('text/plain').send(outcome.body);
    },
  );

  app.post(
    '/webhook',
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const stopTimer = context.metrics.requestDuration.startTimer();
      let statusCode = 200;

      try {
        const signature = request.headers['x-hub-signature-256'];
        const result = await context.service.handleWebhook({
          payload: request.body,
          rawBody: request.rawBody,
          signatureHeader: typeof signature === 'string' ? signature : undefined,
        });

        request.log.debug({ ...result }, 'WhatsApp webhook handled');
        context.metrics.requestCounter.inc({ method: request.method, status: '200' });
        return reply.code(200).type('text/plain').send('ok');
      } catch (error) {
        statusCode = inferStatusCode(error);
        context.metrics.requestCounter.inc({ method: request.method, status: String(statusCode) });
        throw error;
      } finally {
        stopTimer({ method: request.method, status: String(statusCode) });
      }
    },
  );

  app.route({
    method: [...UNSUPPORTED_METHODS],
    url: '/webhook',
    handler: async () => {
      throw new MethodNotAllowedError();
    },
  });
}
