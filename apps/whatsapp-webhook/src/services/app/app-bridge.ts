import {
  attempt,
  err,
  ok,
  type AppInvocationRequest,
  type AppInvocationResponse,
  type AppInvoker,
  type Result,
} from '@wa-relay/core';

import type { AppLogger } from '../../telemetry/logger';
import type { GatewayMetrics } from '../../telemetry/metrics';
import type { ConversationKey, ConversationStore } from '../conversation';

export interface AppBridgeInput {
  appId: string;
  query: string;
  identifyInputs: Record<string, string>;
  conversationKey: ConversationKey;
}

export type AppBridgeFailure =
  | { kind: 'invocation_failed'; cause: unknown }
  | { kind: 'empty_answer' };

/** Response fields that may carry the reply, in order of preference. */
const REPLY_FIELDS = ['answer', 'output_text', 'message'] as const;

/**
 * Calls the App for one user turn while carrying the conversation's
 * continuity token across turns. Store failures only cost continuity: they
 * are logged and the turn proceeds as a fresh conversation.
 */
export class AppBridge {
  constructor(
    private readonly invoker: AppInvoker,
    private readonly conversations: ConversationStore,
    private readonly metrics: GatewayMetrics,
    private readonly logger: AppLogger,
  ) {}

  async invoke(input: AppBridgeInput): Promise<Result<string, AppBridgeFailure>> {
    const conversationId = await this.readContinuityToken(input.conversationKey);

    const request: AppInvocationRequest = {
      appId: input.appId,
      query: input.query,
      inputs: { ...input.identifyInputs },
      responseMode: 'blocking',
    };
    if (conversationId) {
      request.conversationId = conversationId;
    }

    const response = await attempt(
      () => this.invoker.invoke(request),
      (cause): AppBridgeFailure => ({ kind: 'invocation_failed', cause }),
    );

    if (!response.ok) {
      this.metrics.appInvocations.inc({ status: 'error' });
      this.logger.warn(
        { appId: input.appId, conversationKey: input.conversationKey, error: response.error },
        'App invocation failed',
      );
      return response;
    }

    const nextConversationId = extractConversationId(response.value);
    if (nextConversationId) {
      await this.writeContinuityToken(input.conversationKey, nextConversationId);
    }

    const reply = extractReplyText(response.value);
    if (reply === undefined) {
      this.metrics.appInvocations.inc({ status: 'empty' });
      this.logger.info({ appId: input.appId }, 'App returned no usable answer');
      return err({ kind: 'empty_answer' });
    }

    this.metrics.appInvocations.inc({ status: 'success' });
    return ok(reply);
  }

  private async readContinuityToken(key: ConversationKey): Promise<string | undefined> {
    const stored = await attempt(
      () => this.conversations.get(key),
      (cause) => cause,
    );

    if (!stored.ok) {
      this.metrics.conversationStoreErrors.inc({ operation: 'get' });
      this.logger.warn(
        { conversationKey: key, error: stored.error },
        'Failed to read conversation token; starting a new conversation',
      );
      return undefined;
    }

    if (!stored.value || stored.value.length === 0) {
      return undefined;
    }

    return stored.value.toString('utf8');
  }

  private async writeContinuityToken(key: ConversationKey, token: string): Promise<void> {
    const written = await attempt(
      () => this.conversations.set(key, Buffer.from(token, 'utf8')),
      (cause) => cause,
    );

    if (!written.ok) {
      this.metrics.conversationStoreErrors.inc({ operation: 'set' });
      this.logger.warn(
        { conversationKey: key, error: written.error },
        'Failed to persist conversation token',
      );
    }
  }
}

/** First non-empty string among `answer`, `output_text` and `message`. */
export function extractReplyText(response: AppInvocationResponse): string | undefined {
  for (const field of REPLY_FIELDS) {
    const value = response[field];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }

  return undefined;
}

export function extractConversationId(response: AppInvocationResponse): string | undefined {
  const value = response.conversation_id;

  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return undefined;
}
