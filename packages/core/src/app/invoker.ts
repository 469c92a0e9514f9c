/**
 * Minimal logging contract used by the App invoker implementations.
 * A pino or console-like logger satisfies this interface out of the box.
 */
export interface LoggerLike {
  debug?(payload?: unknown, message?: string): void;
  info?(payload?: unknown, message?: string): void;
  warn?(payload?: unknown, message?: string): void;
  error?(payload?: unknown, message?: string): void;
}

export type AppResponseMode = 'blocking';

/** A single chat turn sent to the conversational backend. */
export interface AppInvocationRequest {
  appId: string;
  query: string;
  inputs: Record<string, string>;
  responseMode: AppResponseMode;
  /** Continuity token from an earlier turn; omitted on first contact. */
  conversationId?: string;
}

/**
 * Raw mapping returned by the backend. Known keys are `answer`,
 * `output_text`, `message` and `conversation_id`; anything else is kept as-is.
 */
export type AppInvocationResponse = Record<string, unknown>;

/** Contract implemented by invoker strategies used to call the App. */
export interface AppInvoker {
  invoke(request: AppInvocationRequest): Promise<AppInvocationResponse>;
}

export interface AppInvokerOptions {
  baseUrl?: string;
  apiKey?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export const DEFAULT_APP_INVOKE_TIMEOUT_MS = 60_000;

/** Wraps every failure raised while calling the App backend. */
export class AppInvocationError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'AppInvocationError';
  }
}

/**
 * Invoker used when no App endpoint is configured. It logs and fails every
 * call so callers fall back to their own default reply.
 */
class LoggingAppInvoker implements AppInvoker {
  constructor(private readonly logger: LoggerLike) {}

  async invoke(request: AppInvocationRequest): Promise<AppInvocationResponse> {
    this.logger.warn?.(
      { appId: request.appId, hasConversation: Boolean(request.conversationId) },
      'App invoker not configured - skipping invocation',
    );

    throw new AppInvocationError('App invoker not configured');
  }
}

/** Factory that chooses the appropriate invoker for the provided options. */
export function createAppInvoker(logger: LoggerLike, options: AppInvokerOptions = {}): AppInvoker {
  if (!options.baseUrl) {
    return new LoggingAppInvoker(logger);
  }

  return new HttpAppInvoker(logger, { ...options, baseUrl: options.baseUrl });
}

/** Invoker that posts blocking chat requests to the App's HTTP API. */
class HttpAppInvoker implements AppInvoker {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(
    private readonly logger: LoggerLike,
    options: AppInvokerOptions & { baseUrl: string },
  ) {
    this.endpoint = `${options.baseUrl.replace(/\/$/, '')}/chat-messages`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_APP_INVOKE_TIMEOUT_MS;
    this.headers = {
      ...(options.headers ?? {}),
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (options.apiKey) {
      this.headers.Authorization ??= `Bearer ${options.apiKey}`;
    }
  }

  async invoke(request: AppInvocationRequest): Promise<AppInvocationResponse> {
    let response: Response;

    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(buildInvocationBody(request)),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      this.logger.error?.({ error, appId: request.appId }, 'Failed to reach App backend');
      throw new AppInvocationError('Failed to reach App backend', undefined, error);
    }

    if (!response.ok) {
      this.logger.warn?.(
        { appId: request.appId, status: response.status },
        'App backend rejected invocation',
      );
      throw new AppInvocationError(
        `App backend responded with status ${response.status}`,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AppInvocationError('App backend returned a non-JSON body', response.status, error);
    }

    if (!isRecord(body)) {
      throw new AppInvocationError('App backend returned an unexpected body', response.status);
    }

    this.logger.debug?.(
      { appId: request.appId, conversationId: body.conversation_id },
      'App invocation completed',
    );

    return body;
  }
}

/** Wire shape of an invocation; `conversation_id` only appears when known. */
export function buildInvocationBody(request: AppInvocationRequest): Record<string, unknown> {
  const body: Record<string, unknown> = {
    app_id: request.appId,
    query: request.query,
    inputs: { ...request.inputs },
    response_mode: request.responseMode,
  };

  if (request.conversationId) {
    body.conversation_id = request.conversationId;
  }

  return body;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
