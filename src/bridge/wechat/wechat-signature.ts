import { createHash } from 'crypto';
import { secureCompare } from '../../common/utils/secure-compare';

/**
 * WeChat signature: SHA1 hex of the lexicographically sorted parts,
 * concatenated. Used for the webhook `signature` (token, timestamp,
 * nonce) and the encrypted-mode `msg_signature` (plus the ciphertext).
 */
export function computeSignature(...parts: string[]): string {
  return createHash('sha1').update([...parts].sort().join('')).digest('hex');
}

export function verifySignature(
  token: string,
  signature: string,
  timestamp: string,
  nonce: string,
): boolean {
  return secureCompare(computeSignature(token, timestamp, nonce), signature);
}
