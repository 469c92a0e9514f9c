export type WhatsAppObjectType = 'whatsapp_business_account';

export interface WhatsAppWebhookPayload {
  object?: WhatsAppObjectType | string;
  entry?: WhatsAppWebhookEntry[];
}

export interface WhatsAppWebhookEntry {
  id?: string;
  changes?: WhatsAppWebhookChange[];
}

export interface WhatsAppWebhookChange {
  field?: string;
  value?: WhatsAppWebhookValue;
}

export interface WhatsAppWebhookValue {
  messaging_product?: string;
  metadata?: {
    display_phone_number?: string;
    phone_number_id?: string;
  };
  contacts?: WhatsAppContact[];
  messages?: WhatsAppInboundMessage[];
  statuses?: unknown[];
}

export interface WhatsAppContact {
  wa_id?: string;
  profile?: { name?: string };
}

export interface WhatsAppInboundMessage {
  id?: string;
  from?: string;
  timestamp?: string;
  type?: string;
  text?: { body?: string };
  [key: string]: unknown;
}

export interface NormalizedTextMessage {
  kind: 'text';
  senderId: string;
  text: string;
  messageId?: string;
  timestamp?: string;
}

export interface NormalizedUnsupportedMessage {
  kind: 'unsupported';
  senderId?: string;
  type?: string;
  messageId?: string;
}

export type NormalizedWhatsAppMessage = NormalizedTextMessage | NormalizedUnsupportedMessage;

export interface Credentials {
  accessToken: string;
  phoneNumberId: string;
}

export interface SendTextCommand {
  credentials: Credentials;
  to: string;
  body: string;
  timeoutMs?: number;
}

export interface WhatsAppSendApiRequest {
  messaging_product: 'whatsapp';
  to: string;
  type: 'text';
  text: { body: string };
}

/** Response body as the send client reports it: parsed JSON or a truncated text fallback. */
export type WhatsAppResponseBody = Record<string, unknown> | unknown[] | { text: string };

export interface WhatsAppSendResult {
  status: number;
  url: string;
  body: WhatsAppResponseBody;
  messageId?: string;
}

/** Structured error extracted from a Graph API error body. */
export interface GraphApiErrorDetails {
  code?: number;
  type?: string;
  message?: string;
  error_subcode?: number;
  fbtrace_id?: string;
}

export interface HttpResponseLike {
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInitLike {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export type HttpClient = (url: string, init?: HttpRequestInitLike) => Promise<HttpResponseLike>;

export interface WhatsAppCloudClientConfig {
  graphApiVersion?: string;
  graphApiBaseUrl?: string;
  httpClient?: HttpClient;
  defaultTimeoutMs?: number;
}
