import { createHmac, timingSafeEqual } from 'crypto';

export function computeSignature(secret: string, body: Buffer): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Check a hex HMAC-SHA256 signature of `body` in constant time.
 *
 * @returns `false` for a missing, malformed or mismatched signature
 */
export function verifySignature(
  secret: string,
  body: Buffer,
  signature: string | undefined,
): boolean {
  if (!signature || !/^[0-9a-fA-F]+$/.test(signature)) {
    return false;
  }

  const expected = Buffer.from(computeSignature(secret, body), 'hex');
  const provided = Buffer.from(signature, 'hex');

  if (provided.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(expected, provided);
}
