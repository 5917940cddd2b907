import * as crypto from 'crypto';

export const SHA256_SIGNATURE_PREFIX = 'sha256=';

/**
 * Compute a 'sha256=<hex>' signature over the raw body
 */
export function signHmacSha256(rawBody: Buffer | string, secret: string): string {
  const digest = crypto.createHmac('sha256', secret).update(rawBody).digest('hex');
  return `${SHA256_SIGNATURE_PREFIX}${digest}`;
}

/**
 * Verify a 'sha256=<hex>' HMAC signature over the raw body.
 * Each secret is tried in turn to allow rotation; comparison is constant-time.
 */
export function verifyHmacSha256Signature(
  rawBody: Buffer,
  signature: string | undefined,
  secrets: readonly string[],
): boolean {
  if (!signature || !signature.startsWith(SHA256_SIGNATURE_PREFIX)) {
    return false;
  }

  const hex = signature.slice(SHA256_SIGNATURE_PREFIX.length);
  if (!/^[0-9a-f]{64}$/i.test(hex)) {
    return false;
  }
  const provided = Buffer.from(hex, 'hex');

  return secrets
    .filter((secret) => secret.length > 0)
    .some((secret) => {
      const expected = crypto.createHmac('sha256', secret).update(rawBody).digest();
      return crypto.timingSafeEqual(expected, provided);
    });
}
