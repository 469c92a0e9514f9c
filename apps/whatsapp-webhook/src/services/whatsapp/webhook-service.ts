import { attempt } from '@wa-relay/core';
import {
  hasCredentials,
  normalizeWebhookPayload,
  validateCredentials,
  verifyRequestSignature,
  type Credentials,
  type NormalizedTextMessage,
} from '@wa-relay/whatsapp-sdk';

import { SignatureVerificationError } from '../../errors';
import type { AppLogger } from '../../telemetry/logger';
import type { AppBridge } from '../app/app-bridge';
import { resolveAppId, type AppSelector } from '../app/app-selector';
import { conversationKey } from '../conversation';

import type { OutboundSender } from './outbound-sender';
import { hasWebhookEntries, parseWhatsAppWebhookPayload } from './webhook-payload-schema';

/** Deployment settings that drive the webhook pipeline. */
export interface WhatsAppWebhookServiceOptions {
  accessToken: string;
  phoneNumberId: string;
  appSelector?: AppSelector;
  /** When set, deliveries must carry a valid `X-Hub-Signature-256`. */
  appSecret?: string;
}

export interface HandleWebhookInput {
  payload: unknown;
  rawBody?: Buffer | string;
  signatureHeader?: string;
}

export interface HandleWebhookResult {
  receivedMessages: number;
  processedMessages: number;
  failedMessages: number;
}

/** How a single inbound text was answered. */
export type ReplySource = 'app' | 'echo';

export interface MessageOutcome {
  senderId: string;
  source: ReplySource;
  replied: boolean;
}

const EMPTY_RESULT: HandleWebhookResult = {
  receivedMessages: 0,
  processedMessages: 0,
  failedMessages: 0,
};

/**
 * Coordinates webhook intake, App invocation with conversation continuity,
 * and best-effort replies. Apart from the optional signature check it never
 * throws: every failure is mapped to a fallback so the platform always gets
 * its acknowledgement and does not redeliver.
 */
export class WhatsAppWebhookService {
  private readonly appId?: string;
  private readonly credentials?: Credentials;

  constructor(
    private readonly bridge: AppBridge,
    private readonly sender: OutboundSender,
    private readonly logger: AppLogger,
    private readonly options: WhatsAppWebhookServiceOptions,
  ) {
    this.appId = resolveAppId(options.appSelector);

    if (hasCredentials(options)) {
      this.credentials = validateCredentials(options);
    }
  }

  get canReply(): boolean {
    return this.credentials !== undefined;
  }

  async handleWebhook(input: HandleWebhookInput): Promise<HandleWebhookResult> {
    this.assertSignature(input);

    if (!hasWebhookEntries(input.payload)) {
      return { ...EMPTY_RESULT };
    }

    const payload = parseWhatsAppWebhookPayload(input.payload);
    const messages = normalizeWebhookPayload(payload);
    const result: HandleWebhookResult = { ...EMPTY_RESULT, receivedMessages: messages.length };

    for (const message of messages) {
      if (message.kind !== 'text') {
        this.logger.debug(
          { messageId: message.messageId, type: message.type },
          'Skipping WhatsApp message without text',
        );
        continue;
      }

      const outcome = await attempt(
        () => this.processMessage(message),
        (cause) => cause,
      );

      if (outcome.ok) {
        result.processedMessages += 1;
      } else {
        result.failedMessages += 1;
        this.logger.error(
          { messageId: message.messageId, error: outcome.error },
          'Failed to process WhatsApp message',
        );
      }
    }

    return result;
  }

  /** Answer one inbound text: App reply when available, otherwise the text itself. */
  async processMessage(message: NormalizedTextMessage): Promise<MessageOutcome> {
    const phoneNumberId = this.options.phoneNumberId.trim();
    let replyText: string | undefined;
    let source: ReplySource = 'echo';

    if (this.appId) {
      const reply = await this.bridge.invoke({
        appId: this.appId,
        query: message.text,
        identifyInputs: {
          whatsapp_user_id: message.senderId,
          phone_number_id: phoneNumberId,
        },
        conversationKey: conversationKey(phoneNumberId, message.senderId),
      });

      if (reply.ok) {
        replyText = reply.value;
        source = 'app';
      } else {
        this.logger.info(
          { senderId: message.senderId, reason: reply.error.kind },
          'Falling back to echo reply',
        );
      }
    }

    replyText ||= message.text;

    if (!this.credentials || !replyText) {
      return { senderId: message.senderId, source, replied: false };
    }

    await this.sender.bestEffortSend(this.credentials, message.senderId, replyText);
    return { senderId: message.senderId, source, replied: true };
  }

  private assertSignature(input: HandleWebhookInput): void {
    if (!this.options.appSecret) {
      return;
    }

    const valid = verifyRequestSignature({
      appSecret: this.options.appSecret,
      signatureHeader: input.signatureHeader,
      payload: input.rawBody ?? '',
    });

    if (!valid) {
      this.logger.warn(
        {
          hasSignature: Boolean(input.signatureHeader),
          signaturePreview: input.signatureHeader?.slice(0, 12),
        },
        'Rejected WhatsApp webhook due to invalid signature',
      );
      throw new SignatureVerificationError();
    }
  }
}
