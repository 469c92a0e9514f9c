import { describe, expect, it } from 'vitest';

import {
  REMEDIATION_HINTS,
  classifyApiError,
  extractApiError,
  suggestFix,
} from '../src/api-errors';

describe('extractApiError', () => {
  it('extracts the structured Graph error', () => {
    const body = {
      error: {
        message: 'Invalid OAuth access token.',
        type: 'OAuthException',
        code: 190,
        error_subcode: 463,
        fbtrace_id: 'trace-1',
      },
    };

    expect(extractApiError(body)).toEqual({
      code: 190,
      type: 'OAuthException',
      message: 'Invalid OAuth access token.',
      error_subcode: 463,
      fbtrace_id: 'trace-1',
    });
  });

  it('returns null when the body carries no error key', () => {
    expect(extractApiError({ messages: [] })).toBeNull();
    expect(extractApiError({ text: 'Bad Gateway' })).toBeNull();
    expect(extractApiError(undefined)).toBeNull();
  });

  it('returns empty details for an error key without an object', () => {
    expect(extractApiError({ error: null })).toEqual({});
  });
});

describe('classifyApiError', () => {
  it('maps code 190 to an invalid access token', () => {
    expect(classifyApiError({ code: 190 })).toBe('invalid_access_token');
  });

  it('maps code 100 to invalid parameters', () => {
    expect(classifyApiError({ code: 100, error_subcode: 131031 })).toBe('invalid_parameters');
  });

  it.each([2018049, 131000, 131031])('maps subcode %i to an unavailable recipient', (subcode) => {
    expect(classifyApiError({ code: 10, error_subcode: subcode })).toBe('recipient_unavailable');
  });

  it('maps unsupported post requests to an account mismatch', () => {
    expect(
      classifyApiError({
        code: 33,
        message: 'Unsupported post request. Object with ID does not exist',
      }),
    ).toBe('account_mismatch');
  });

  it('falls back to account setup guidance', () => {
    expect(classifyApiError({})).toBe('account_setup');
    expect(classifyApiError({ code: 200, message: 'Permissions error' })).toBe('account_setup');
  });
});

describe('suggestFix', () => {
  it('returns the hint of the classified category', () => {
    expect(suggestFix({ code: 190 })).toBe(REMEDIATION_HINTS.invalid_access_token);
    expect(suggestFix({ code: 190 })).toContain('expired access token');
  });
});
