export type VerificationQuery = Record<string, unknown>;

export interface VerificationOutcome {
  statusCode: 200 | 403;
  body: string;
}

const FORBIDDEN: VerificationOutcome = { statusCode: 403, body: 'Forbidden' };

/**
 * Answer Meta's subscription handshake. The challenge is echoed verbatim
 * only for `subscribe` requests whose token matches a non-empty configured
 * token; every other request, including one that fails to parse, is
 * forbidden.
 */
export function respondToVerification(
  query: VerificationQuery | undefined,
  expectedToken: string,
): VerificationOutcome {
  try {
    const params = query ?? {};
    const mode = (firstValue(params, 'hub.mode') || firstValue(params, 'mode') || '').trim();
    const token = (
      firstValue(params, 'hub.verify_token') ||
      firstValue(params, 'verify_token') ||
      ''
    ).trim();
    const challenge = firstValue(params, 'hub.challenge');
    const expected = expectedToken.trim();

    if (mode === 'subscribe' && expected && token === expected && challenge !== undefined) {
      return { statusCode: 200, body: challenge };
    }

    return FORBIDDEN;
  } catch {
    return FORBIDDEN;
  }
}

/** Query parsers yield arrays for repeated keys; the first occurrence wins. */
function firstValue(params: VerificationQuery, key: string): string | undefined {
  const value = params[key];
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : undefined;
}
