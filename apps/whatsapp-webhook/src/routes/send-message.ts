import { z } from 'zod';

import { UnauthorizedToolRequestError } from '../errors';
import type { GatewayFastifyInstance, RouteRateLimit } from '../server/types';
import type { SendMessageOutcome, SendMessageTool } from '../services/whatsapp/send-message-tool';

export interface SendMessageRouteContext {
  tool: SendMessageTool;
  /** When set, callers must send `Authorization: Bearer <apiKey>`. */
  apiKey?: string;
  rateLimit?: RouteRateLimit;
}

const sendMessageBodySchema = z
  .object({
    to: z.string().optional().catch(undefined),
    text: z.string().optional().catch(undefined),
  })
  .catch({});

const STATUS_BY_OUTCOME: Record<SendMessageOutcome, number> = {
  sent: 200,
  invalid_parameters: 400,
  misconfigured: 500,
  failed: 502,
};

/** Register `POST /tools/send-message`, the direct-send tool's HTTP surface. */
export async function registerSendMessageRoutes(
  app: GatewayFastifyInstance,
  context: SendMessageRouteContext,
): Promise<void> {
  app.post(
    '/tools/send-message',
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      if (context.apiKey && request.headers.authorization !== `Bearer ${context.apiKey}`) {
        request.log.warn('Rejected send-message request without a valid API key');
        throw new UnauthorizedToolRequestError();
      }

      const input = sendMessageBodySchema.parse(request.body ?? {});
      const result = await context.tool.invoke(input);

      return reply
        .code(STATUS_BY_OUTCOME[result.outcome])
        .send({ status: result.outcome, messages: result.messages });
    },
  );
}
