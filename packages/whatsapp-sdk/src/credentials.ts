import type { Credentials } from './types';

export interface CredentialsInput {
  accessToken?: string | null;
  phoneNumberId?: string | null;
}

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}

/** Trim both values and reject either one being empty. */
export function validateCredentials(input: CredentialsInput): Credentials {
  const accessToken = (input.accessToken ?? '').trim();
  const phoneNumberId = (input.phoneNumberId ?? '').trim();

  if (!accessToken) {
    throw new CredentialsError('Missing access_token');
  }
  if (!phoneNumberId) {
    throw new CredentialsError('Missing phone_number_id');
  }

  return { accessToken, phoneNumberId };
}

export function hasCredentials(input: CredentialsInput): boolean {
  return Boolean(input.accessToken?.trim() && input.phoneNumberId?.trim());
}
