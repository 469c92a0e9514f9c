/** Raised when the POST body cannot be parsed as JSON. */
export class InvalidJsonBodyError extends Error {
  readonly statusCode = 400;

  constructor(
    message = 'Bad Request',
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InvalidJsonBodyError';
  }
}

/** Error thrown when the `X-Hub-Signature-256` check fails. */
export class SignatureVerificationError extends Error {
  readonly statusCode = 403;

  constructor(message = 'Forbidden') {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}

/** Raised when a direct-send request lacks the configured tool API key. */
export class UnauthorizedToolRequestError extends Error {
  readonly statusCode = 401;

  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedToolRequestError';
  }
}

export class MethodNotAllowedError extends Error {
  readonly statusCode = 405;

  constructor(message = 'Method Not Allowed') {
    super(message);
    this.name = 'MethodNotAllowedError';
  }
}

/**
 * Translate known error shapes into HTTP status codes. Any unexpected error
 * falls back to HTTP 500.
 */
export function inferStatusCode(error: unknown): number {
  if (error && typeof error === 'object' && 'statusCode' in error) {
    const status = error.statusCode;
    if (typeof status === 'number' && status >= 400 && status < 600) {
      return status;
    }
  }

  return 500;
}
