import { describe, expect, it } from 'vitest';

import { respondToVerification } from './verification';

describe('respondToVerification', () => {
  it('echoes the challenge when mode and token match', () => {
    const outcome = respondToVerification(
      { 'hub.mode': 'subscribe', 'hub.verify_token': 'X', 'hub.challenge': '123' },
      'X',
    );

    expect(outcome).toEqual({ statusCode: 200, body: '123' });
  });

  it('rejects a mismatched token', () => {
    const outcome = respondToVerification(
      { 'hub.mode': 'subscribe', 'hub.verify_token': 'Y', 'hub.challenge': '123' },
      'X',
    );

    expect(outcome).toEqual({ statusCode: 403, body: 'Forbidden' });
  });

  it('accepts bare parameter names and trims values', () => {
    const outcome = respondToVerification(
      { mode: ' subscribe ', verify_token: ' X ', 'hub.challenge': 'abc' },
      ' X',
    );

    expect(outcome).toEqual({ statusCode: 200, body: 'abc' });
  });

  it('uses the first value of repeated parameters', () => {
    const outcome = respondToVerification(
      { 'hub.mode': ['subscribe', 'other'], 'hub.verify_token': ['X'], 'hub.challenge': ['c1', 'c2'] },
      'X',
    );

    expect(outcome).toEqual({ statusCode: 200, body: 'c1' });
  });

  it('is forbidden when no token is configured', () => {
    const outcome = respondToVerification(
      { 'hub.mode': 'subscribe', 'hub.verify_token': '', 'hub.challenge': '123' },
      '',
    );

    expect(outcome.statusCode).toBe(403);
  });

  it('is forbidden for other modes or a missing challenge', () => {
    expect(
      respondToVerification({ 'hub.mode': 'unsubscribe', 'hub.verify_token': 'X', 'hub.challenge': '1' }, 'X')
        .statusCode,
    ).toBe(403);
    expect(respondToVerification({ 'hub.mode': 'subscribe', 'hub.verify_token': 'X' }, 'X').statusCode).toBe(403);
    expect(respondToVerification(undefined, 'X').statusCode).toBe(403);
  });
});
