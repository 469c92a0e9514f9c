import type { GraphApiErrorDetails } from './types';

export type ApiErrorCategory =
  | 'invalid_access_token'
  | 'invalid_parameters'
  | 'recipient_unavailable'
  | 'account_mismatch'
  | 'account_setup';

/** Subcodes the Cloud API returns when the 24h customer-service window is closed. */
const RECIPIENT_UNAVAILABLE_SUBCODES: ReadonlySet<number> = new Set([2018049, 131000, 131031]);

export const REMEDIATION_HINTS: Readonly<Record<ApiErrorCategory, string>> = {
  invalid_access_token:
    'Invalid or expired access token. Recreate a system user token with proper permissions.',
  invalid_parameters:
    "Invalid parameters. Verify 'phone_number_id' and that 'to' is a valid international number.",
  recipient_unavailable:
    'Recipient has not messaged your business recently or is not opted-in. ' +
    'Ensure a recent user-initiated session or use an approved template.',
  account_mismatch: 'Check that the phone_number_id belongs to your app and Business Account.',
  account_setup:
    "Check Business Account setup, permissions (whatsapp_business_messaging), and recipient format (E.164 without '+').",
};

/**
 * Pull the Graph `error` object out of a response body. Returns null when the
 * body has no `error` key at all; an `error` key with an unusable value still
 * yields an (empty) details object.
 */
export function extractApiError(body: unknown): GraphApiErrorDetails | null {
  if (!isRecord(body) || !('error' in body)) {
    return null;
  }

  const candidate = body.error;
  if (!isRecord(candidate)) {
    return {};
  }

  return {
    code: asNumber(candidate.code),
    type: asString(candidate.type),
    message: asString(candidate.message),
    error_subcode: asNumber(candidate.error_subcode),
    fbtrace_id: asString(candidate.fbtrace_id),
  };
}

export function classifyApiError(error: GraphApiErrorDetails): ApiErrorCategory {
  if (error.code === 190) {
    return 'invalid_access_token';
  }
  if (error.code === 100) {
    return 'invalid_parameters';
  }
  if (error.error_subcode !== undefined && RECIPIENT_UNAVAILABLE_SUBCODES.has(error.error_subcode)) {
    return 'recipient_unavailable';
  }
  if ((error.message ?? '').includes('Unsupported post request')) {
    return 'account_mismatch';
  }
  return 'account_setup';
}

export function suggestFix(error: GraphApiErrorDetails): string {
  return REMEDIATION_HINTS[classifyApiError(error)];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
