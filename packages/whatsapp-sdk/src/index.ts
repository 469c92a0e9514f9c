export {
  WhatsAppCloudClient,
  WhatsAppApiError,
  extractMessageId,
  isSuccessStatus,
  readResponseBody,
} from './client';
export {
  REMEDIATION_HINTS,
  classifyApiError,
  extractApiError,
  suggestFix,
  type ApiErrorCategory,
} from './api-errors';
export {
  CredentialsError,
  hasCredentials,
  validateCredentials,
  type CredentialsInput,
} from './credentials';
export {
  buildTextMessageRequest,
  extractText,
  normalizeInboundMessage,
  normalizeRecipient,
  normalizeWebhookPayload,
} from './normalizers';
export {
  createSignatureDigest,
  createSignatureHeader,
  parseSignatureHeader,
  verifyRequestSignature,
} from './signature';
export type * from './types';
