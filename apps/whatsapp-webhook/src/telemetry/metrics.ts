import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface GatewayMetrics {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDuration: Histogram<string>;
  appInvocations: Counter<string>;
  conversationStoreErrors: Counter<string>;
  outboundMessages: Counter<string>;
}

export interface MetricsOptions {
  prefix?: string;
  registry?: Registry;
  collectDefaults?: boolean;
}

export function createMetrics(options: MetricsOptions = {}): GatewayMetrics {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? 'whatsapp_gateway_';

  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const requestCounter = new Counter({
    name: `${prefix}requests_total`,
    help: 'Total number of webhook requests processed',
    labelNames: ['method', 'status'],
    registers: [registry],
  });

  const requestDuration = new Histogram({
    name: `${prefix}request_duration_seconds`,
    help: 'Webhook request duration in seconds',
    labelNames: ['method', 'status'],
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10],
    registers: [registry],
  });

  const appInvocations = new Counter({
    name: `${prefix}app_invocations_total`,
    help: 'App backend invocations by outcome',
    labelNames: ['status'],
    registers: [registry],
  });

  const conversationStoreErrors = new Counter({
    name: `${prefix}conversation_store_errors_total`,
    help: 'Conversation store reads/writes that failed and were skipped',
    labelNames: ['operation'],
    registers: [registry],
  });

  const outboundMessages = new Counter({
    name: `${prefix}outbound_messages_total`,
    help: 'Total WhatsApp messages sent by the gateway',
    labelNames: ['kind', 'status'],
    registers: [registry],
  });

  return {
    registry,
    requestCounter,
    requestDuration,
    appInvocations,
    conversationStoreErrors,
    outboundMessages,
  };
}
