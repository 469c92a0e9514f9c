import { normalizeRecipient, type CredentialsInput } from '@wa-relay/whatsapp-sdk';

import type { AppLogger } from '../../telemetry/logger';

import type { OutboundSender, SendFailure } from './outbound-sender';

export type ToolLogStatus = 'success' | 'error' | 'info';

export type ToolMessage =
  | { type: 'log'; label: string; data: Record<string, unknown>; status: ToolLogStatus }
  | { type: 'json'; data: Record<string, unknown> }
  | { type: 'text'; text: string };

export type SendMessageOutcome = 'sent' | 'invalid_parameters' | 'misconfigured' | 'failed';

export interface SendMessageToolInput {
  to?: string | null;
  text?: string | null;
}

export interface SendMessageToolResult {
  outcome: SendMessageOutcome;
  messages: ToolMessage[];
}

/**
 * Direct-send tool: sends one text to an arbitrary recipient and reports
 * each step as a tool message so callers can surface progress and
 * remediation hints.
 */
export class SendMessageTool {
  constructor(
    private readonly sender: OutboundSender,
    private readonly credentials: CredentialsInput,
    private readonly logger: AppLogger,
  ) {}

  async invoke(input: SendMessageToolInput): Promise<SendMessageToolResult> {
    const messages: ToolMessage[] = [];
    const log = (label: string, data: Record<string, unknown>, status: ToolLogStatus = 'info') => {
      messages.push({ type: 'log', label, data, status });
      this.mirror(label, data, status);
    };

    const recipient = input.to ?? '';
    const text = input.text ?? '';
    const to = normalizeRecipient(recipient.trim());
    const phoneNumberId = (this.credentials.phoneNumberId ?? '').trim();

    const result = await this.sender.checkedSend(this.credentials, recipient, text, () => {
      log('send_request', { url: this.sender.endpointFor(phoneNumberId), to });
    });

    if (result.ok) {
      const { status, response, waMessageId } = result.value;
      log('send_response', { status_code: status, body: response }, 'success');
      messages.push({ type: 'json', data: { result: 'sent', to: result.value.to, response } });
      messages.push({
        type: 'text',
        text: `sent to ${result.value.to}` + (waMessageId ? ` (id: ${waMessageId})` : ''),
      });
      return { outcome: 'sent', messages };
    }

    return { outcome: this.describeFailure(result.error, log, messages), messages };
  }

  private describeFailure(
    failure: SendFailure,
    log: (label: string, data: Record<string, unknown>, status?: ToolLogStatus) => void,
    messages: ToolMessage[],
  ): SendMessageOutcome {
    switch (failure.kind) {
      case 'missing_credentials':
        log(
          'credentials',
          {
            error: 'Missing credentials',
            have_access_token: failure.hasAccessToken,
            have_phone_number_id: failure.hasPhoneNumberId,
          },
          'error',
        );
        messages.push({ type: 'text', text: 'Configuration error: missing WhatsApp credentials' });
        return 'misconfigured';

      case 'missing_parameters':
        log(
          'parameters',
          { error: 'Missing required parameters', to: failure.hasTo, text: failure.hasText },
          'error',
        );
        messages.push({ type: 'text', text: 'Missing required parameters: to, text' });
        return 'invalid_parameters';

      case 'api_error':
        log('send_response', { status_code: failure.status, body: failure.response }, 'error');
        if (failure.apiError) {
          messages.push({ type: 'json', data: { error: failure.apiError, hint: failure.hint } });
        } else {
          messages.push({ type: 'text', text: `Failed to send message: HTTP ${failure.status}` });
        }
        return 'failed';

      case 'transport':
        log('exception', { error: describeCause(failure.cause) }, 'error');
        messages.push({ type: 'text', text: 'Failed to send message due to exception' });
        return 'failed';
    }
  }

  private mirror(label: string, data: Record<string, unknown>, status: ToolLogStatus): void {
    const bindings = { tool: 'send_message', label, ...data };
    if (status === 'error') {
      this.logger.warn(bindings, `send_message ${label}`);
    } else {
      this.logger.info(bindings, `send_message ${label}`);
    }
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
