import { createSignatureHeader } from '@wa-relay/whatsapp-sdk';
import { afterEach, describe, expect, it } from 'vitest';

import type { GatewayFastifyInstance } from '../server';
import { baseConfig, createTestServer } from '../testing/server';

const textDelivery = {
  object: 'whatsapp_business_account',
  entry: [
    {
      id: 'waba-1',
      changes: [
        {
          field: 'messages',
          value: {
            messaging_product: 'whatsapp',
            metadata: { phone_number_id: 'pn-1' },
            messages: [{ id: 'wamid.in', from: '1555', type: 'text', text: { body: 'hello' } }],
          },
        },
      ],
    },
  ],
};

describe('webhook routes', () => {
  let server: GatewayFastifyInstance | undefined;

  afterEach(async () => {
    if (server) {
      await server.close();
      server = undefined;
    }
  });

  describe('GET /webhook', () => {
    it('echoes the challenge for a matching token', async () => {
      ({ server } = await createTestServer());

      const response = await server.inject({
        method: 'GET',
        url: '/webhook?hub.mode=subscribe&hub.verify_token=X&hub.challenge=123',
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toBe('123');
    });

    it('forbids a mismatched token', async () => {
      ({ server } = await createTestServer());

      const response = await server.inject({
        method: 'GET',
        url: '/webhook?hub.mode=subscribe&hub.verify_token=Y&hub.challenge=123',
      });

      expect(response.statusCode).toBe(403);
      expect(response.body).toBe('Forbidden');
    });
  });

  describe('POST /webhook', () => {
    it('acknowledges and echoes a text message', async () => {
      const harness = await createTestServer();
      server = harness.server;

      const response = await server.inject({ method: 'POST', url: '/webhook', payload: textDelivery });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('ok');
      expect(harness.sent).toEqual([
        {
          url: 'https://graph.facebook.com/v24.0/pn-1/messages',
          authorization: 'Bearer test-token',
          to: '1555',
          body: 'hello',
        },
      ]);
    });

    it('relays the App answer for a configured selector', async () => {
      const harness = await createTestServer({
        config: { ...baseConfig, app: { ...baseConfig.app, selector: { kind: 'bare', value: 'app-1' } } },
        invoker: { invoke: async () => ({ answer: 'hi there', conversation_id: 'c1' }) },
      });
      server = harness.server;

      await server.inject({ method: 'POST', url: '/webhook', payload: textDelivery });

      expect(harness.sent.map((message) => message.body)).toEqual(['hi there']);
    });

    it('acknowledges deliveries without entries', async () => {
      const harness = await createTestServer();
      server = harness.server;

      const response = await server.inject({
        method: 'POST',
        url: '/webhook',
        payload: { object: 'whatsapp_business_account' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('ok');
      expect(harness.sent).toEqual([]);
    });

    it('treats an empty body as an empty delivery', async () => {
      ({ server } = await createTestServer());

      const response = await server.inject({
        method: 'POST',
        url: '/webhook',
        payload: '',
        headers: { 'content-type': 'application/json' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('ok');
    });

    it('rejects a body that is not JSON', async () => {
      const harness = await createTestServer();
      server = harness.server;

      const response = await server.inject({
        method: 'POST',
        url: '/webhook',
        payload: '{not json',
        headers: { 'content-type': 'application/json' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.headers['content-type']).toContain('text/plain');
      expect(response.body).toBe('Bad Request');
      expect(harness.sent).toEqual([]);
    });

    it('still acknowledges when the platform rejects the reply', async () => {
      const harness = await createTestServer({
        graphStatus: 400,
        graphBody: { error: { code: 131031, message: 'Recipient blocked' } },
      });
      server = harness.server;

      const response = await server.inject({ method: 'POST', url: '/webhook', payload: textDelivery });

      expect(response.statusCode).toBe(200);
      expect(response.body).toBe('ok');
      expect(harness.sent).toHaveLength(1);
    });

    describe('with an app secret', () => {
      const config = { ...baseConfig, whatsapp: { ...baseConfig.whatsapp, appSecret: 'test-secret' } };

      it('rejects an unsigned delivery', async () => {
        const harness = await createTestServer({ config });
        server = harness.server;

        const response = await server.inject({ method: 'POST', url: '/webhook', payload: textDelivery });

        expect(response.statusCode).toBe(403);
        expect(response.body).toBe('Forbidden');
        expect(harness.sent).toEqual([]);

        const counter = await harness.metrics.registry.getSingleMetricAsString(
          'whatsapp_gateway_requests_total',
        );
        expect(counter).toContain('whatsapp_gateway_requests_total{method="POST",status="403"} 1');
      });

      it('accepts a delivery signed over the raw body', async () => {
        const harness = await createTestServer({ config });
        server = harness.server;
        const rawBody = JSON.stringify(textDelivery);

        const response = await server.inject({
          method: 'POST',
          url: '/webhook',
          payload: rawBody,
          headers: {
            'content-type': 'application/json',
            'x-hub-signature-256': createSignatureHeader('test-secret', rawBody),
          },
        });

        expect(response.statusCode).toBe(200);
        expect(harness.sent).toHaveLength(1);
      });
    });
  });

  it.each(['PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const)('answers %s with 405', async (method) => {
    ({ server } = await createTestServer());

    const response = await server.inject({ method, url: '/webhook' });

    expect(response.statusCode).toBe(405);
    expect(response.body).toBe('Method Not Allowed');
  });

  it('answers HEAD with 405 instead of running the handshake', async () => {
    ({ server } = await createTestServer());

    const response = await server.inject({
      method: 'HEAD',
      url: '/webhook?hub.mode=subscribe&hub.verify_token=X&hub.challenge=1',
    });

    expect(response.statusCode).toBe(405);
  });

  it('serves health and metrics endpoints', async () => {
    ({ server } = await createTestServer());

    const health = await server.inject({ method: 'GET', url: '/healthz' });
    const metrics = await server.inject({ method: 'GET', url: '/metrics' });

    expect(health.json()).toEqual({ status: 'ok' });
    expect(metrics.statusCode).toBe(200);
    expect(metrics.body).toContain('whatsapp_gateway_outbound_messages_total');
  });

  it('propagates the caller request id', async () => {
    ({ server } = await createTestServer());

    const response = await server.inject({
      method: 'GET',
      url: '/healthz',
      headers: { 'x-request-id': 'req-42' },
    });

    expect(response.headers['x-request-id']).toBe('req-42');
  });
});
