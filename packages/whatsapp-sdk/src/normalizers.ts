import type {
  NormalizedWhatsAppMessage,
  WhatsAppInboundMessage,
  WhatsAppSendApiRequest,
  WhatsAppWebhookPayload,
} from './types';

/**
 * Flatten a webhook delivery into its messages, in delivery order. Missing or
 * non-array levels are treated as empty so partial payloads (status-only
 * updates, test pings) simply yield nothing.
 */
export function normalizeWebhookPayload(
  payload: WhatsAppWebhookPayload | undefined,
): NormalizedWhatsAppMessage[] {
  if (!payload || !Array.isArray(payload.entry)) {
    return [];
  }

  const results: NormalizedWhatsAppMessage[] = [];

  for (const entry of payload.entry) {
    if (!entry || !Array.isArray(entry.changes)) {
      continue;
    }

    for (const change of entry.changes) {
      const messages = change?.value?.messages;
      if (!Array.isArray(messages)) {
        continue;
      }

      for (const message of messages) {
        if (!message) {
          continue;
        }
        results.push(normalizeInboundMessage(message));
      }
    }
  }

  return results;
}

export function normalizeInboundMessage(message: WhatsAppInboundMessage): NormalizedWhatsAppMessage {
  const senderId = typeof message.from === 'string' && message.from.length > 0 ? message.from : undefined;
  const text = extractText(message);

  if (senderId && text !== undefined) {
    return {
      kind: 'text',
      senderId,
      text,
      messageId: message.id,
      timestamp: message.timestamp,
    };
  }

  return {
    kind: 'unsupported',
    senderId,
    type: message.type,
    messageId: message.id,
  };
}

/** Only `text` messages carry extractable content; the body may be empty. */
export function extractText(message: WhatsAppInboundMessage): string | undefined {
  if (message.type !== 'text') {
    return undefined;
  }

  const body = message.text?.body;
  return typeof body === 'string' ? body : undefined;
}

/** The Cloud API expects the international number as digits only, without '+'. */
export function normalizeRecipient(raw: string): string {
  return raw.replace(/[^0-9]/g, '');
}

export function buildTextMessageRequest(to: string, body: string): WhatsAppSendApiRequest {
  return {
    messaging_product: 'whatsapp',
    to,
    type: 'text',
    text: { body },
  };
}
