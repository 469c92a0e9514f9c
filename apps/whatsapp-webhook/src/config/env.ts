import { z } from 'zod';

import { parseAppSelector, type AppSelector } from '../services/app/app-selector';

function positiveInt(name: string, fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => {
      if (!value) {
        return fallback;
      }
      const parsed = Number.parseInt(value, 10);
      if (Number.isNaN(parsed) || parsed <= 0) {
        throw new Error(`Invalid ${name} value: ${value}`);
      }
      return parsed;
    });
}

const trimmedString = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

/**
 * Zod schema describing the environment contract of the gateway. WhatsApp
 * credentials are optional here: without them the webhook still
 * acknowledges deliveries but never replies.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: positiveInt('PORT', 8080),
  WHATSAPP_ACCESS_TOKEN: trimmedString,
  WHATSAPP_PHONE_NUMBER_ID: trimmedString,
  WHATSAPP_VERIFY_TOKEN: trimmedString,
  WHATSAPP_APP_SECRET: z.string().min(1).optional(),
  WHATSAPP_GRAPH_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, 'WHATSAPP_GRAPH_API_VERSION must look like v24.0')
    .default('v24.0'),
  WHATSAPP_MAX_TEXT_LENGTH: positiveInt('WHATSAPP_MAX_TEXT_LENGTH', 4096),
  APP_SELECTOR: z.string().optional(),
  APP_API_BASE_URL: z.string().url('APP_API_BASE_URL must be a valid URL').optional(),
  APP_API_KEY: z.string().min(1).optional(),
  APP_INVOKE_TIMEOUT_MS: positiveInt('APP_INVOKE_TIMEOUT_MS', 60_000),
  CONVERSATION_STORE_DRIVER: z
    .string()
    .optional()
    .transform((value) => (value ? value.toLowerCase() : 'memory'))
    .pipe(z.enum(['memory', 'redis'])),
  REDIS_URL: z.string().url('REDIS_URL must be a valid URL').optional(),
  TOOL_API_KEY: z.string().min(1).optional(),
  LOG_LEVEL: z.string().optional(),
  WEBHOOK_RATE_LIMIT_MAX: positiveInt('WEBHOOK_RATE_LIMIT_MAX', 600),
  WEBHOOK_RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
});

export type ConversationStoreDriver = z.infer<typeof envSchema>['CONVERSATION_STORE_DRIVER'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  whatsapp: {
    accessToken: string;
    phoneNumberId: string;
    verifyToken: string;
    appSecret?: string;
    graphApiVersion: string;
    maxTextLength: number;
  };
  app: {
    selector?: AppSelector;
    baseUrl?: string;
    apiKey?: string;
    timeoutMs: number;
  };
  conversationStore: {
    driver: ConversationStoreDriver;
    redisUrl?: string;
  };
  rateLimit: {
    max: number;
    timeWindow: string;
  };
  tools: {
    apiKey?: string;
  };
  logLevel?: string;
}

/**
 * Parse and validate configuration from the provided environment source,
 * returning a strongly typed settings object or throwing a descriptive error
 * if any variable is malformed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new Error(firstError?.message ?? 'Invalid environment configuration');
  }

  const data = result.data;

  let selector: AppSelector | undefined;
  try {
    selector = parseAppSelector(data.APP_SELECTOR);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid APP_SELECTOR value: ${reason}`);
  }

  return {
    env: data.NODE_ENV,
    port: data.PORT,
    whatsapp: {
      accessToken: data.WHATSAPP_ACCESS_TOKEN,
      phoneNumberId: data.WHATSAPP_PHONE_NUMBER_ID,
      verifyToken: data.WHATSAPP_VERIFY_TOKEN,
      appSecret: data.WHATSAPP_APP_SECRET,
      graphApiVersion: data.WHATSAPP_GRAPH_API_VERSION,
      maxTextLength: data.WHATSAPP_MAX_TEXT_LENGTH,
    },
    app: {
      selector,
      baseUrl: data.APP_API_BASE_URL,
      apiKey: data.APP_API_KEY,
      timeoutMs: data.APP_INVOKE_TIMEOUT_MS,
    },
    conversationStore: {
      driver: data.CONVERSATION_STORE_DRIVER,
      redisUrl: data.REDIS_URL,
    },
    rateLimit: {
      max: data.WEBHOOK_RATE_LIMIT_MAX,
      timeWindow: data.WEBHOOK_RATE_LIMIT_WINDOW,
    },
    tools: {
      apiKey: data.TOOL_API_KEY,
    },
    logLevel: data.LOG_LEVEL,
  };
}
