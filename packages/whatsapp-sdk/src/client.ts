import { extractApiError } from './api-errors';
import { validateCredentials } from './credentials';
import { buildTextMessageRequest, normalizeRecipient } from './normalizers';
import type {
  Credentials,
  GraphApiErrorDetails,
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  SendTextCommand,
  WhatsAppCloudClientConfig,
  WhatsAppResponseBody,
  WhatsAppSendResult,
} from './types';

const DEFAULT_GRAPH_API_BASE_URL = 'https://graph.facebook.com';
const DEFAULT_GRAPH_API_VERSION = 'v24.0';
const DEFAULT_TIMEOUT_MS = 20_000;
const RAW_BODY_PREVIEW_LENGTH = 500;

export class WhatsAppCloudClient {
  private readonly graphApiBaseUrl: string;
  private readonly graphApiVersion: string;
  private readonly defaultTimeoutMs: number;
  private readonly httpClient: HttpClient;

  constructor(config: WhatsAppCloudClientConfig = {}) {
    this.graphApiBaseUrl = config.graphApiBaseUrl ?? DEFAULT_GRAPH_API_BASE_URL;
    this.graphApiVersion = config.graphApiVersion ?? DEFAULT_GRAPH_API_VERSION;
    this.defaultTimeoutMs = config.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  /**
   * Send a single text message. Resolves for any 2xx response and throws a
   * {@link WhatsAppApiError} for every other status; transport failures
   * (timeouts, DNS, resets) propagate as thrown by the HTTP client.
   */
  async sendText(command: SendTextCommand): Promise<WhatsAppSendResult> {
    const credentials = validateCredentials(command.credentials);
    const to = normalizeRecipient(command.to);

    if (!to) {
      throw new Error('sendText requires a recipient with at least one digit.');
    }
    if (!command.body) {
      throw new Error('sendText requires a non-empty body.');
    }

    const url = this.messagesEndpoint(credentials.phoneNumberId);
    const response = await this.httpClient(url, {
      method: 'POST',
      headers: buildHeaders(credentials),
      body: JSON.stringify(buildTextMessageRequest(to, command.body)),
      timeoutMs: command.timeoutMs ?? this.defaultTimeoutMs,
    });

    const body = await readResponseBody(response);

    if (!isSuccessStatus(response.status)) {
      const graphError = extractApiError(body);
      throw new WhatsAppApiError(
        graphError?.message ?? `WhatsApp Cloud API request failed with status ${response.status}.`,
        response.status,
        body,
        graphError,
      );
    }

    return {
      status: response.status,
      url,
      body,
      messageId: extractMessageId(body),
    };
  }

  messagesEndpoint(phoneNumberId: string): string {
    const baseUrl = this.graphApiBaseUrl.replace(/\/$/, '');
    const version = this.graphApiVersion.replace(/^\//, '');
    return `${baseUrl}/${version}/${encodeURIComponent(phoneNumberId)}/messages`;
  }
}

export class WhatsAppApiError extends Error {
  readonly status: number;
  readonly details: WhatsAppResponseBody;
  readonly graphError: GraphApiErrorDetails | null;
  readonly code?: number;
  readonly type?: string;
  readonly errorSubcode?: number;
  readonly fbtraceId?: string;

  constructor(
    message: string,
    status: number,
    details: WhatsAppResponseBody,
    graphError: GraphApiErrorDetails | null = null,
  ) {
    super(message);
    this.name = 'WhatsAppApiError';
    this.status = status;
    this.details = details;
    this.graphError = graphError;

    if (graphError) {
      this.code = graphError.code;
      this.type = graphError.type;
      this.errorSubcode = graphError.error_subcode;
      this.fbtraceId = graphError.fbtrace_id;
    }
  }
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/** `messages[0].id` of a send response, when the body carries one. */
export function extractMessageId(body: WhatsAppResponseBody): string | undefined {
  if (Array.isArray(body) || !('messages' in body)) {
    return undefined;
  }

  const messages = body.messages;
  if (!Array.isArray(messages) || messages.length === 0) {
    return undefined;
  }

  const [first] = messages;
  if (typeof first === 'object' && first !== null && 'id' in first && typeof first.id === 'string') {
    return first.id;
  }

  return undefined;
}

/** Parse the body as JSON, falling back to the first 500 characters of raw text. */
export async function readResponseBody(response: HttpResponseLike): Promise<WhatsAppResponseBody> {
  const raw = await safeReadText(response);
  const parsed = parseJson(raw);

  if (Array.isArray(parsed) || isRecord(parsed)) {
    return parsed;
  }

  return { text: raw.slice(0, RAW_BODY_PREVIEW_LENGTH) };
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function buildHeaders(credentials: Credentials): Record<string, string> {
  return {
    Authorization: `Bearer ${credentials.accessToken}`,
    'Content-Type': 'application/json',
  };
}

async function safeReadText(response: HttpResponseLike): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

const defaultHttpClient: HttpClient = async (url, init?: HttpRequestInitLike) => {
  const response = await fetch(url, {
    method: init?.method,
    headers: init?.headers,
    body: init?.body,
    signal: init?.timeoutMs ? AbortSignal.timeout(init.timeoutMs) : undefined,
  });

  return {
    status: response.status,
    text: () => response.text(),
  };
};
