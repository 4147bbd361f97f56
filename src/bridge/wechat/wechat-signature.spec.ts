import { createHash } from 'crypto';
import { computeSignature, verifySignature } from './wechat-signature';

const sha1 = (s: string) => createHash('sha1').update(s).digest('hex');

describe('WeChat signature', () => {
  it('hashes the sorted parts concatenated', () => {
    // sorted: '1700000000' < 'nonce-1' < 'test-token'
    expect(computeSignature('test-token', '1700000000', 'nonce-1')).toBe(
      sha1('1700000000nonce-1test-token'),
    );
  });

  it('does not depend on argument order', () => {
    expect(computeSignature('b', 'a', 'c')).toBe(computeSignature('c', 'b', 'a'));
  });

  it('verifies a matching signature and rejects anything else', () => {
    const signature = sha1('1700000000nonce-1test-token');

    expect(verifySignature('test-token', signature, '1700000000', 'nonce-1')).toBe(true);
    expect(verifySignature('test-token', signature, '1700000001', 'nonce-1')).toBe(false);
    expect(verifySignature('test-token', 'short', '1700000000', 'nonce-1')).toBe(false);
    expect(verifySignature('test-token', '', '1700000000', 'nonce-1')).toBe(false);
  });
});
