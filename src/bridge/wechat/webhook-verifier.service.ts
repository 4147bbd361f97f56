import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  describeError,
  errorKind,
} from '../../common/errors/application.errors';
import {
  readBoolean,
  readString,
  requireString,
} from '../../config/config.helpers';
import { WeChatCrypto } from './wechat-crypto';
import { verifySignature } from './wechat-signature';

export type OpenedEnvelope =
  | { ok: true; xml: string; decrypted: boolean }
  | { ok: false; error: string };

/**
 * Checks WeChat webhook signatures and, when an encoding AES key is
 * configured, opens encrypted envelopes.
 */
@Injectable()
export class WebhookVerifier {
  private readonly log = new Logger(WebhookVerifier.name);
  private readonly token: string;
  private readonly crypto: WeChatCrypto | null;
  private readonly plaintextFallback: boolean;

  constructor(cfg: ConfigService) {
    this.token = requireString(cfg, 'WECHAT_TOKEN');
    const aesKey = readString(cfg, 'WECHAT_ENCODING_AES_KEY');
    this.crypto = aesKey
      ? new WeChatCrypto(this.token, aesKey, requireString(cfg, 'WECHAT_APPID'))
      : null;
    this.plaintextFallback = readBoolean(cfg, 'WECHAT_DECRYPT_FALLBACK', true);
  }

  verify(signature: string, timestamp: string, nonce: string): boolean {
    return verifySignature(this.token, signature, timestamp, nonce);
  }

  /**
   * Returns the XML to parse. With encryption configured a failed
   * decryption falls back to the raw body unless WECHAT_DECRYPT_FALLBACK
   * is false.
   */
  open(
    body: string,
    msgSignature: string | undefined,
    timestamp: string,
    nonce: string,
  ): OpenedEnvelope {
    if (!this.crypto) {
      return { ok: true, xml: body, decrypted: false };
    }

    try {
      const xml = this.crypto.decryptMessage(
        body,
        msgSignature ?? '',
        timestamp,
        nonce,
      );
      this.log.debug('[open] message decrypted');
      return { ok: true, xml, decrypted: true };
    } catch (err) {
      this.log.error(
        `[open] decryption failed error=${describeError(err)} ` +
          `kind=${errorKind(err)} fallback=${this.plaintextFallback}`,
      );
      if (this.plaintextFallback) {
        return { ok: true, xml: body, decrypted: false };
      }
      return { ok: false, error: describeError(err) };
    }
  }
}
