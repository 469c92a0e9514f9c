import { describe, expect, it } from 'vitest';

import { loadConfig } from './env';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({ NODE_ENV: 'test' });

    expect(config).toEqual({
      env: 'test',
      port: 8080,
      whatsapp: {
        accessToken: '',
        phoneNumberId: '',
        verifyToken: '',
        appSecret: undefined,
        graphApiVersion: 'v24.0',
        maxTextLength: 4096,
      },
      app: {
        selector: undefined,
        baseUrl: undefined,
        apiKey: undefined,
        timeoutMs: 60_000,
      },
      conversationStore: { driver: 'memory', redisUrl: undefined },
      rateLimit: { max: 600, timeWindow: '1 minute' },
      tools: { apiKey: undefined },
      logLevel: undefined,
    });
  });

  it('trims WhatsApp credentials and the verify token', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      WHATSAPP_ACCESS_TOKEN: ' test-token ',
      WHATSAPP_PHONE_NUMBER_ID: ' pn-1\n',
      WHATSAPP_VERIFY_TOKEN: ' X ',
    });

    expect(config.whatsapp).toMatchObject({
      accessToken: 'test-token',
      phoneNumberId: 'pn-1',
      verifyToken: 'X',
    });
  });

  it('parses bare and structured app selectors', () => {
    expect(loadConfig({ NODE_ENV: 'test', APP_SELECTOR: 'app-1' }).app.selector).toEqual({
      kind: 'bare',
      value: 'app-1',
    });
    expect(loadConfig({ NODE_ENV: 'test', APP_SELECTOR: '{"app_id":"app-2"}' }).app.selector).toEqual({
      kind: 'structured',
      app_id: 'app-2',
      id: undefined,
    });
  });

  it('rejects a malformed structured selector', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', APP_SELECTOR: '{oops' })).toThrow(
      /^Invalid APP_SELECTOR value: /,
    );
  });

  it('reads numeric and driver settings', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '3000',
      WHATSAPP_MAX_TEXT_LENGTH: '1000',
      APP_INVOKE_TIMEOUT_MS: '5000',
      CONVERSATION_STORE_DRIVER: 'REDIS',
      REDIS_URL: 'redis://localhost:6379',
    });

    expect(config.env).toBe('production');
    expect(config.port).toBe(3000);
    expect(config.whatsapp.maxTextLength).toBe(1000);
    expect(config.app.timeoutMs).toBe(5000);
    expect(config.conversationStore).toEqual({ driver: 'redis', redisUrl: 'redis://localhost:6379' });
  });

  it('rejects invalid values with the first issue message', () => {
    expect(() => loadConfig({ NODE_ENV: 'test', PORT: 'abc' })).toThrow('Invalid PORT value: abc');
    expect(() => loadConfig({ NODE_ENV: 'test', CONVERSATION_STORE_DRIVER: 'disk' })).toThrow();
    expect(() => loadConfig({ NODE_ENV: 'test', APP_API_BASE_URL: 'not a url' })).toThrow(
      'APP_API_BASE_URL must be a valid URL',
    );
  });
});
