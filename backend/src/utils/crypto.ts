/**
 * HMAC chain helpers for the audit log.
 */

import { createHmac, timingSafeEqual } from 'crypto';

/** Previous-digest value for the first line of an audit log */
export const GENESIS_DIGEST = '0'.repeat(64);

/**
 * HMAC-SHA256 over the previous digest and this line's payload, hex encoded.
 */
export function chainDigest(previous: string, payload: string, secret: string): string {
  return createHmac('sha256', secret).update(`${previous}\n${payload}`).digest('hex');
}

export function digestsEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'hex');
  const right = Buffer.from(b, 'hex');
  return left.length === right.length && left.length > 0 && timingSafeEqual(left, right);
}
