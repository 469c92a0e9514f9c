import type { AppInvoker } from '@wa-relay/core';
import { WhatsAppCloudClient, type HttpClient } from '@wa-relay/whatsapp-sdk';

import type { AppConfig } from '../config';
import { createServer, type GatewayFastifyInstance } from '../server';
import { AppBridge } from '../services/app';
import { InMemoryConversationStore } from '../services/conversation';
import { OutboundSender, SendMessageTool, WhatsAppWebhookService } from '../services/whatsapp';
import { createLogger } from '../telemetry/logger';
import { createMetrics, type GatewayMetrics } from '../telemetry/metrics';

export const baseConfig: AppConfig = {
  env: 'test',
  port: 8080,
  whatsapp: {
    accessToken: 'test-token',
    phoneNumberId: 'pn-1',
    verifyToken: 'X',
    graphApiVersion: 'v24.0',
    maxTextLength: 4096,
  },
  app: {
    timeoutMs: 60_000,
  },
  conversationStore: {
    driver: 'memory',
  },
  rateLimit: {
    max: 100,
    timeWindow: '1 minute',
  },
  tools: {},
  logLevel: 'silent',
};

export interface SentMessage {
  url: string;
  authorization?: string;
  to: string;
  body: string;
}

export interface TestServer {
  server: GatewayFastifyInstance;
  metrics: GatewayMetrics;
  sent: SentMessage[];
}

/**
 * Build the full server against an in-process Graph API stand-in that
 * records every send and answers with `graphStatus`/`graphBody`.
 */
export async function createTestServer(
  options: {
    config?: AppConfig;
    invoker?: AppInvoker;
    graphStatus?: number;
    graphBody?: unknown;
  } = {},
): Promise<TestServer> {
  const config = options.config ?? baseConfig;
  const sent: SentMessage[] = [];
  const graphStatus = options.graphStatus ?? 200;
  const graphBody = options.graphBody ?? { messages: [{ id: 'wamid.out' }] };

  const httpClient: HttpClient = async (url, init) => {
    const request = JSON.parse(init?.body ?? '{}');
    sent.push({
      url,
      authorization: init?.headers?.Authorization,
      to: request.to,
      body: request.text.body,
    });
    return {
      status: graphStatus,
      text: async () => (typeof graphBody === 'string' ? graphBody : JSON.stringify(graphBody)),
    };
  };

  const logger = createLogger({ level: 'silent' });
  const metrics = createMetrics({ collectDefaults: false });
  const sender = new OutboundSender(new WhatsAppCloudClient({ httpClient }), metrics, logger, {
    maxTextLength: config.whatsapp.maxTextLength,
  });
  const invoker: AppInvoker = options.invoker ?? {
    invoke: async () => {
      throw new Error('App not available');
    },
  };
  const bridge = new AppBridge(invoker, new InMemoryConversationStore(), metrics, logger);

  const webhookService = new WhatsAppWebhookService(bridge, sender, logger, {
    accessToken: config.whatsapp.accessToken,
    phoneNumberId: config.whatsapp.phoneNumberId,
    appSelector: config.app.selector,
    appSecret: config.whatsapp.appSecret,
  });
  const sendMessageTool = new SendMessageTool(
    sender,
    { accessToken: config.whatsapp.accessToken, phoneNumberId: config.whatsapp.phoneNumberId },
    logger,
  );

  const server = await createServer({ config, logger, metrics, webhookService, sendMessageTool });
  return { server, metrics, sent };
}
