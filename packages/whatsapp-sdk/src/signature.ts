import { createHmac, timingSafeEqual } from 'node:crypto';

/** Meta signs webhook deliveries as `sha256=<hex hmac>` in `X-Hub-Signature-256`. */
const SIGNATURE_HEADER_PATTERN = /^sha256=([a-fA-F0-9]{64})$/;

export function parseSignatureHeader(header?: string | null): string | null {
  if (!header) {
    return null;
  }

  const match = SIGNATURE_HEADER_PATTERN.exec(header.trim());
  return match?.[1] ? match[1].toLowerCase() : null;
}

export function createSignatureDigest(appSecret: string, payload: string | Buffer): Buffer {
  const hmac = createHmac('sha256', appSecret);
  hmac.update(Buffer.isBuffer(payload) ? payload : Buffer.from(payload, 'utf8'));
  return hmac.digest();
}

export function createSignatureHeader(appSecret: string, payload: string | Buffer): string {
  return `sha256=${createSignatureDigest(appSecret, payload).toString('hex')}`;
}

export function verifyRequestSignature({
  appSecret,
  signatureHeader,
  payload,
}: {
  appSecret: string;
  signatureHeader?: string | null;
  payload: string | Buffer;
}): boolean {
  const hash = parseSignatureHeader(signatureHeader);
  if (!hash) {
    return false;
  }

  const expected = createSignatureDigest(appSecret, payload);
  const provided = Buffer.from(hash, 'hex');

  if (expected.length !== provided.length) {
    return false;
  }

  return timingSafeEqual(expected, provided);
}
