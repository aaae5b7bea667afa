import { createHmac, timingSafeEqual } from 'crypto';

const SIGNATURE_PREFIX = 'sha256=';

/**
 * Constant-time string comparison; length mismatch is a plain false
 */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  if (left.length !== right.length) return false;
  return timingSafeEqual(left, right);
}

export function signPayload(body: Buffer | string, secret: string): string {
  return SIGNATURE_PREFIX + createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Check a GitHub `X-Hub-Signature-256` header against the raw request body.
 * An empty secret disables verification.
 */
export function verifySignature(body: Buffer | string, header: string | undefined, secret: string): boolean {
  if (!secret) return true;
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) return false;
  return safeEqual(signPayload(body, secret), header);
}
