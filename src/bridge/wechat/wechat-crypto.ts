import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { secureCompare } from '../../common/utils/secure-compare';
import { extractEncryptedPayload } from './wechat-message.parser';
import { computeSignature } from './wechat-signature';

const BLOCK_SIZE = 32;
const RANDOM_PREFIX_BYTES = 16;
const LENGTH_BYTES = 4;

export class WeChatCryptoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WeChatCryptoError';
  }
}

/**
 * WeChat "safe mode" message crypto.
 *
 * AES-256-CBC keyed by base64(encodingAESKey + "="), IV = first 16 key
 * bytes, PKCS#7 padded to 32-byte blocks. Plaintext layout:
 * 16 random bytes | uint32 BE length | message | appId.
 */
export class WeChatCrypto {
  private readonly key: Buffer;
  private readonly iv: Buffer;

  constructor(
    private readonly token: string,
    encodingAesKey: string,
    private readonly appId: string,
  ) {
    this.key = Buffer.from(`${encodingAesKey}=`, 'base64');
    if (this.key.length !== 32) {
      throw new WeChatCryptoError('Invalid encoding AES key');
    }
    this.iv = this.key.subarray(0, 16);
  }

  /**
   * Verifies `msg_signature` over the `<Encrypt>` element and returns the
   * decrypted inner XML.
   */
  decryptMessage(
    xml: string,
    msgSignature: string,
    timestamp: string,
    nonce: string,
  ): string {
    const encrypted = extractEncryptedPayload(xml);
    if (!encrypted) {
      throw new WeChatCryptoError('Missing <Encrypt> element');
    }

    const expected = computeSignature(this.token, timestamp, nonce, encrypted);
    if (!secureCompare(expected, msgSignature)) {
      throw new WeChatCryptoError('Invalid msg_signature');
    }

    return this.decrypt(encrypted);
  }

  decrypt(encrypted: string): string {
    let plain: Buffer;
    try {
      const decipher = createDecipheriv('aes-256-cbc', this.key, this.iv);
      decipher.setAutoPadding(false);
      plain = Buffer.concat([
        decipher.update(Buffer.from(encrypted, 'base64')),
        decipher.final(),
      ]);
    } catch (err) {
      throw new WeChatCryptoError(
        `AES decryption failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    const pad = plain.length > 0 ? plain[plain.length - 1] : 0;
    if (pad < 1 || pad > BLOCK_SIZE || pad > plain.length) {
      throw new WeChatCryptoError('Invalid padding');
    }
    const content = plain.subarray(0, plain.length - pad);
    if (content.length < RANDOM_PREFIX_BYTES + LENGTH_BYTES) {
      throw new WeChatCryptoError('Decrypted payload too short');
    }

    const start = RANDOM_PREFIX_BYTES + LENGTH_BYTES;
    const length = content.readUInt32BE(RANDOM_PREFIX_BYTES);
    if (start + length > content.length) {
      throw new WeChatCryptoError('Declared message length exceeds payload');
    }

    const fromAppId = content.subarray(start + length).toString('utf8');
    if (fromAppId !== this.appId) {
      throw new WeChatCryptoError('AppId mismatch');
    }
    return content.subarray(start, start + length).toString('utf8');
  }

  encrypt(
    message: string,
    randomPrefix: Buffer = randomBytes(RANDOM_PREFIX_BYTES),
  ): string {
    const body = Buffer.from(message, 'utf8');
    const length = Buffer.alloc(LENGTH_BYTES);
    length.writeUInt32BE(body.length, 0);

    const unpadded = Buffer.concat([
      randomPrefix.subarray(0, RANDOM_PREFIX_BYTES),
      length,
      body,
      Buffer.from(this.appId, 'utf8'),
    ]);
    const pad = BLOCK_SIZE - (unpadded.length % BLOCK_SIZE);
    const padded = Buffer.concat([unpadded, Buffer.alloc(pad, pad)]);

    const cipher = createCipheriv('aes-256-cbc', this.key, this.iv);
    cipher.setAutoPadding(false);
    return Buffer.concat([cipher.update(padded), cipher.final()]).toString(
      'base64',
    );
  }
}
