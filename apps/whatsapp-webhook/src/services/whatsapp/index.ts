export {
  BEST_EFFORT_SEND_TIMEOUT_MS,
  CHECKED_SEND_TIMEOUT_MS,
  OutboundSender,
  chunkText,
  type CheckedSendSuccess,
  type OutboundMessageKind,
  type OutboundSenderOptions,
  type SendFailure,
} from './outbound-sender';
export {
  SendMessageTool,
  type SendMessageOutcome,
  type SendMessageToolInput,
  type SendMessageToolResult,
  type ToolLogStatus,
  type ToolMessage,
} from './send-message-tool';
export { respondToVerification, type VerificationOutcome, type VerificationQuery } from './verification';
export { hasWebhookEntries, parseWhatsAppWebhookPayload } from './webhook-payload-schema';
export {
  WhatsAppWebhookService,
  type HandleWebhookInput,
  type HandleWebhookResult,
  type MessageOutcome,
  type ReplySource,
  type WhatsAppWebhookServiceOptions,
} from './webhook-service';
