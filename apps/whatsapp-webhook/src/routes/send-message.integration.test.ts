import { afterEach, describe, expect, it } from 'vitest';

import type { GatewayFastifyInstance } from '../server';
import { baseConfig, createTestServer } from '../testing/server';

describe('POST /tools/send-message', () => {
  let server: GatewayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  it('sends the message and returns the tool messages', async () => {
    const harness = await createTestServer({ graphBody: { messages: [{ id: 'wamid.1' }] } });
    server = harness.server;

    const response = await server.inject({
      method: 'POST',
      url: '/tools/send-message',
      payload: { to: '+1 555 0100', text: 'hi' },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('sent');
    expect(body.messages.at(-1)).toEqual({ type: 'text', text: 'sent to 15550100 (id: wamid.1)' });
    expect(harness.sent).toEqual([
      expect.objectContaining({ to: '15550100', body: 'hi' }),
    ]);
  });

  it('returns 400 when a parameter is missing', async () => {
    const harness = await createTestServer();
    server = harness.server;

    const response = await server.inject({
      method: 'POST',
      url: '/tools/send-message',
      payload: { to: '1555' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().status).toBe('invalid_parameters');
    expect(harness.sent).toEqual([]);
  });

  it('returns 500 when credentials are not configured', async () => {
    const config = { ...baseConfig, whatsapp: { ...baseConfig.whatsapp, accessToken: '' } };
    ({ server } = await createTestServer({ config }));

    const response = await server.inject({
      method: 'POST',
      url: '/tools/send-message',
      payload: { to: '1555', text: 'hi' },
    });

    expect(response.statusCode).toBe(500);
    expect(response.json().messages.at(-1)).toEqual({
      type: 'text',
      text: 'Configuration error: missing WhatsApp credentials',
    });
  });

  it('returns 502 with a hint when the platform rejects the send', async () => {
    ({ server } = await createTestServer({
      graphStatus: 400,
      graphBody: { error: { code: 190, message: 'Token expired' } },
    }));

    const response = await server.inject({
      method: 'POST',
      url: '/tools/send-message',
      payload: { to: '1555', text: 'hi' },
    });

    expect(response.statusCode).toBe(502);
    expect(response.json().messages.at(-1)).toEqual({
      type: 'json',
      data: {
        error: { code: 190, message: 'Token expired' },
        hint: 'Invalid or expired access token. Recreate a system user token with proper permissions.',
      },
    });
  });

  describe('with a tool API key', () => {
    const config = { ...baseConfig, tools: { apiKey: 'test-key' } };

    it('rejects requests without the bearer key', async () => {
      const harness = await createTestServer({ config });
      server = harness.server;

      const response = await server.inject({
        method: 'POST',
        url: '/tools/send-message',
        payload: { to: '1555', text: 'hi' },
        headers: { authorization: 'Bearer wrong-key' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.body).toBe('Unauthorized');
      expect(harness.sent).toEqual([]);
    });

    it('accepts requests carrying the bearer key', async () => {
      ({ server } = await createTestServer({ config }));

      const response = await server.inject({
        method: 'POST',
        url: '/tools/send-message',
        payload: { to: '1555', text: 'hi' },
        headers: { authorization: 'Bearer test-key' },
      });

      expect(response.statusCode).toBe(200);
    });
  });
});
