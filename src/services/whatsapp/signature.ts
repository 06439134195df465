import { createHmac, timingSafeEqual } from 'crypto';

export const SIGNATURE_HEADER = 'x-hub-signature-256';

/** Expected X-Hub-Signature-256 value for a raw request body */
export function computeSignature(rawBody: string, appSecret: string): string {
  return `sha256=${createHmac('sha256', appSecret).update(rawBody, 'utf8').digest('hex')}`;
}

/**
 * Check the X-Hub-Signature-256 header against the raw body.
 * Comparison is constant-time; a missing or differently sized header fails.
 */
export function verifySignature(rawBody: string, header: string | undefined, appSecret: string): boolean {
  if (!header) return false;

  const expected = Buffer.from(computeSignature(rawBody, appSecret));
  const received = Buffer.from(header);
  if (expected.length !== received.length) return false;

  return timingSafeEqual(expected, received);
}
