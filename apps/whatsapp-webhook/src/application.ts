import { createAppInvoker } from '@wa-relay/core';
import { WhatsAppCloudClient, hasCredentials } from '@wa-relay/whatsapp-sdk';

import { loadConfig, type AppConfig } from './config';
import { createServer, type GatewayFastifyInstance } from './server';
import { AppBridge, resolveAppId } from './services/app';
import {
  InMemoryConversationStore,
  RedisConversationStore,
  type ConversationStore,
} from './services/conversation';
import { OutboundSender, SendMessageTool, WhatsAppWebhookService } from './services/whatsapp';
import { createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type GatewayMetrics } from './telemetry/metrics';

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  server: GatewayFastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

/**
 * Compose the WhatsApp gateway by wiring configuration loading,
 * logging/metrics, the conversation store, the App invoker, and the Fastify
 * server. The returned object exposes lifecycle helpers used by the CLI
 * entrypoint and integration tests so they can start/stop the full stack.
 */
export async function createApplication(env: NodeJS.ProcessEnv = process.env): Promise<Application> {
  const config = loadConfig(env);
  const logger = createLogger({ level: config.logLevel });
  const metrics = createMetrics();

  if (!hasCredentials(config.whatsapp)) {
    logger.warn(
      {
        hasAccessToken: Boolean(config.whatsapp.accessToken),
        hasPhoneNumberId: Boolean(config.whatsapp.phoneNumberId),
      },
      'WhatsApp credentials missing; the webhook will acknowledge deliveries without replying',
    );
  }

  if (config.app.selector && !resolveAppId(config.app.selector)) {
    logger.warn('APP_SELECTOR does not resolve to an app id; replies will echo the inbound text');
  }

  const client = new WhatsAppCloudClient({ graphApiVersion: config.whatsapp.graphApiVersion });
  const sender = new OutboundSender(client, metrics, logger, {
    maxTextLength: config.whatsapp.maxTextLength,
  });

  const conversations = createConversationStore(config);
  const invoker = createAppInvoker(logger, {
    baseUrl: config.app.baseUrl,
    apiKey: config.app.apiKey,
    timeoutMs: config.app.timeoutMs,
  });
  const bridge = new AppBridge(invoker, conversations, metrics, logger);

  const webhookService = new WhatsAppWebhookService(bridge, sender, logger, {
    accessToken: config.whatsapp.accessToken,
    phoneNumberId: config.whatsapp.phoneNumberId,
    appSelector: config.app.selector,
    appSecret: config.whatsapp.appSecret,
  });

  const sendMessageTool = new SendMessageTool(
    sender,
    {
      accessToken: config.whatsapp.accessToken,
      phoneNumberId: config.whatsapp.phoneNumberId,
    },
    logger,
  );

  const server = await createServer({
    config,
    logger,
    metrics,
    webhookService,
    sendMessageTool,
  });

  return {
    config,
    logger,
    metrics,
    server,
    start: () => startServer(server, config),
    stop: () => stopServer(server, conversations, logger),
  };
}

/** Listen on all interfaces so the gateway is reachable inside containers. */
async function startServer(server: GatewayFastifyInstance, config: AppConfig): Promise<void> {
  await server.listen({ port: config.port, host: '0.0.0.0' });
}

/**
 * Shut down the HTTP server and close the Redis connection when one is
 * owned. A failed Redis close is logged so signal-driven shutdowns finish.
 */
async function stopServer(
  server: GatewayFastifyInstance,
  conversations: ConversationStore,
  logger: AppLogger,
): Promise<void> {
  await server.close();

  if (conversations instanceof RedisConversationStore) {
    try {
      await conversations.close();
    } catch (error) {
      logger.warn({ error }, 'Failed to gracefully close Redis conversation store');
    }
  }
}

function createConversationStore(config: AppConfig): ConversationStore {
  if (config.conversationStore.driver === 'redis') {
    if (!config.conversationStore.redisUrl) {
      throw new Error('CONVERSATION_STORE_DRIVER=redis requires REDIS_URL environment variable');
    }

    return new RedisConversationStore({ url: config.conversationStore.redisUrl });
  }

  return new InMemoryConversationStore();
}
