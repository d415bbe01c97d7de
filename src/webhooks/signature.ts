import { createHmac, timingSafeEqual } from 'node:crypto';

export type SignatureEncoding = 'hex' | 'base64';

/** HMAC-SHA256 of the raw body. */
export function signBody(secret: string, body: string, encoding: SignatureEncoding = 'hex'): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest(encoding);
}

function decodeSignature(header: string, encoding: SignatureEncoding): Buffer | undefined {
  const given = header.trim();
  if (encoding === 'base64') {
    return /^[A-Za-z0-9+/]+={0,2}$/.test(given) ? Buffer.from(given, 'base64') : undefined;
  }
  const hex = given.replace(/^sha256=/i, '').toLowerCase();
  return /^[0-9a-f]+$/.test(hex) ? Buffer.from(hex, 'hex') : undefined;
}

/**
 * Constant-time check of a signature header. Hex signatures may carry a
 * `sha256=` prefix (Notion); Todoist sends plain base64.
 */
export function verifySignature(
  secret: string,
  body: string,
  header: string | undefined,
  encoding: SignatureEncoding = 'hex',
): boolean {
  if (!header) return false;
  const actual = decodeSignature(header, encoding);
  if (!actual) return false;

  const expected = createHmac('sha256', secret).update(body, 'utf8').digest();
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}
