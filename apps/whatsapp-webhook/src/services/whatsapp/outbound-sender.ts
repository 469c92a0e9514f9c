import { attempt, err, ok, type Result } from '@wa-relay/core';
import {
  CredentialsError,
  WhatsAppApiError,
  normalizeRecipient,
  suggestFix,
  type Credentials,
  type CredentialsInput,
  type GraphApiErrorDetails,
  type WhatsAppCloudClient,
  type WhatsAppResponseBody,
} from '@wa-relay/whatsapp-sdk';

import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';

/** Webhook replies: the delivery is already acknowledged, so keep this short. */
export const BEST_EFFORT_SEND_TIMEOUT_MS = 10_000;
/** Direct sends: the caller waits for the outcome. */
export const CHECKED_SEND_TIMEOUT_MS = 20_000;

export interface OutboundSenderOptions {
  /** Maximum number of characters the platform accepts in one text message. */
  maxTextLength: number;
}

export interface CheckedSendSuccess {
  to: string;
  status: number;
  response: WhatsAppResponseBody;
  waMessageId?: string;
}

export type SendFailure =
  | { kind: 'missing_credentials'; hasAccessToken: boolean; hasPhoneNumberId: boolean }
  | { kind: 'missing_parameters'; hasTo: boolean; hasText: boolean }
  | {
      kind: 'api_error';
      status: number;
      response: WhatsAppResponseBody;
      apiError: GraphApiErrorDetails | null;
      hint?: string;
    }
  | { kind: 'transport'; cause: unknown };

export type OutboundMessageKind = 'reply' | 'direct';

/**
 * Issues outbound WhatsApp text messages. `bestEffortSend` is the webhook's
 * detached variant: it never rejects and its outcome is only visible in logs
 * and metrics. `checkedSend` reports every outcome to its caller.
 */
export class OutboundSender {
  constructor(
    private readonly client: WhatsAppCloudClient,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
    private readonly options: OutboundSenderOptions,
  ) {}

  endpointFor(phoneNumberId: string): string {
    return this.client.messagesEndpoint(phoneNumberId);
  }

  /** Send a reply, split into platform-sized chunks; failures are logged and dropped. */
  async bestEffortSend(credentials: Credentials, recipientId: string, bodyText: string): Promise<void> {
    if (!recipientId || bodyText.length === 0) {
      return;
    }

    for (const chunk of chunkText(bodyText, this.options.maxTextLength)) {
      const sent = await attempt(
        () =>
          this.client.sendText({
            credentials,
            to: recipientId,
            body: chunk,
            timeoutMs: BEST_EFFORT_SEND_TIMEOUT_MS,
          }),
        (cause) => cause,
      );

      if (!sent.ok) {
        this.record('reply', 'error');
        this.logger.warn(
          { recipientId, error: describeSendError(sent.error) },
          'Failed to send WhatsApp reply',
        );
        break;
      }

      this.record('reply', 'success');
      this.logger.debug({ recipientId, messageId: sent.value.messageId }, 'WhatsApp reply sent');
    }
  }

  /**
   * Send one message on behalf of a caller. Validation failures return
   * before any request is made; API rejections carry a remediation hint.
   * `beforeSend` runs once validation has passed, right before the request.
   */
  async checkedSend(
    credentials: CredentialsInput,
    recipient: string,
    text: string,
    beforeSend?: () => void,
  ): Promise<Result<CheckedSendSuccess, SendFailure>> {
    const accessToken = (credentials.accessToken ?? '').trim();
    const phoneNumberId = (credentials.phoneNumberId ?? '').trim();

    if (!accessToken || !phoneNumberId) {
      return err({
        kind: 'missing_credentials',
        hasAccessToken: Boolean(accessToken),
        hasPhoneNumberId: Boolean(phoneNumberId),
      });
    }

    const to = normalizeRecipient(recipient.trim());
    const body = text.trim();
    if (!to || !body) {
      return err({ kind: 'missing_parameters', hasTo: Boolean(to), hasText: Boolean(body) });
    }

    beforeSend?.();

    const sent = await attempt(
      () =>
        this.client.sendText({
          credentials: { accessToken, phoneNumberId },
          to,
          body,
          timeoutMs: CHECKED_SEND_TIMEOUT_MS,
        }),
      (cause) => cause,
    );

    if (sent.ok) {
      this.record('direct', 'success');
      return ok({
        to,
        status: sent.value.status,
        response: sent.value.body,
        waMessageId: sent.value.messageId,
      });
    }

    this.record('direct', 'error');

    if (sent.error instanceof WhatsAppApiError) {
      const apiError = sent.error.graphError;
      return err({
        kind: 'api_error',
        status: sent.error.status,
        response: sent.error.details,
        apiError,
        hint: apiError ? suggestFix(apiError) : undefined,
      });
    }

    if (sent.error instanceof CredentialsError) {
      return err({ kind: 'missing_credentials', hasAccessToken: true, hasPhoneNumberId: true });
    }

    return err({ kind: 'transport', cause: sent.error });
  }

  private record(kind: OutboundMessageKind, status: 'success' | 'error'): void {
    this.metrics.outboundMessages.inc({ kind, status });
  }
}

function describeSendError(error: unknown): Record<string, unknown> {
  if (error instanceof WhatsAppApiError) {
    return { name: error.name, status: error.status, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}

/** Split text into chunks no longer than the given limit, preferring whitespace. */
export function chunkText(text: string, maxLength: number): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > maxLength) {
    const splitIndex = findSplitIndex(remaining, maxLength);
    const chunk = remaining.slice(0, splitIndex).trim();
    if (chunk.length > 0) {
      chunks.push(chunk);
    }
    remaining = remaining.slice(splitIndex).trimStart();
  }

  if (remaining.length > 0) {
    chunks.push(remaining);
  }

  return chunks;
}

const WHITESPACE = /\s/;

/** Last whitespace at or before `maxLength`, else a hard split that keeps surrogate pairs whole. */
function findSplitIndex(text: string, maxLength: number): number {
  for (let index = Math.min(maxLength, text.length - 1); index > 0; index -= 1) {
    if (WHITESPACE.test(text.charAt(index))) {
      return index;
    }
  }

  return isHighSurrogate(text.charCodeAt(maxLength - 1)) && maxLength > 1 ? maxLength - 1 : maxLength;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
