import { timingSafeEqual } from 'crypto';

/**
 * Constant-time string comparison. Different lengths compare unequal
 * without leaking where the first mismatch is.
 */
export function secureCompare(expected: string, provided: string): boolean {
  const a = Buffer.from(expected, 'utf8');
  const b = Buffer.from(provided, 'utf8');
  if (a.length !== b.length) {
    timingSafeEqual(a, a);
    return false;
  }
  return timingSafeEqual(a, b);
}
