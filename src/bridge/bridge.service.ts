import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import {
  describeError,
  errorKind,
  ExternalApiError,
  ValidationError,
} from '../common/errors/application.errors';
import { readNumber } from '../config/config.helpers';
import { MetricsService } from '../metrics/metrics.service';
import {
  CXONE_POSTER,
  CxonePoster,
  DropReason,
  InboundMessage,
  MAX_EXTERNAL_ID_LENGTH,
  MAX_WEBHOOK_BODY_BYTES,
  WECHAT_SENDER,
  WeChatSender,
  WebhookEnvelope,
  WebhookOutcome,
  WebhookState,
} from './contracts';
import {
  normalizeCxonePayload,
  normalizeWeChatMessage,
} from './normalizer/payload-normalizer';
import { parseWeChatMessage } from './wechat/wechat-message.parser';
import { WebhookVerifier } from './wechat/webhook-verifier.service';

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

function redact(value: string): string {
  return value.length > 10 ? `${value.slice(0, 10)}...` : value;
}

export interface ByocMessageAck {
  idOnExternalPlatform: string;
}

/**
 * Moves messages between WeChat and CXone.
 *
 * Webhook handling walks RECEIVED → VERIFIED → NORMALIZED →
 * FORWARDED | DROPPED → ACKNOWLEDGED. Only a bad signature escapes as an
 * error; every later failure ends in an acknowledged outcome.
 */
@Injectable()
export class BridgeService {
  private readonly log = new Logger(BridgeService.name);
  private readonly requestTimeoutMs: number;

  constructor(
    cfg: ConfigService,
    private readonly verifier: WebhookVerifier,
    private readonly metrics: MetricsService,
    @Inject(WECHAT_SENDER) private readonly wechat: WeChatSender,
    @Inject(CXONE_POSTER) private readonly cxone: CxonePoster,
  ) {
    this.requestTimeoutMs = readNumber(
      cfg,
      'REQUEST_TIMEOUT_MS',
      DEFAULT_REQUEST_TIMEOUT_MS,
    );
  }

  /** Server URL check: echoes `echostr` back when the signature matches. */
  verifyEcho(
    signature: string,
    timestamp: string,
    nonce: string,
    echostr: string,
  ): string {
    this.assertSignature(signature, timestamp, nonce);
    this.log.log('[verifyEcho] WeChat server verification succeeded');
    return echostr;
  }

  /**
   * @throws ValidationError when the signature does not match or the body
   * is over MAX_WEBHOOK_BODY_BYTES. Nothing else is thrown.
   */
  async handleWeChatWebhook(
    envelope: WebhookEnvelope,
  ): Promise<WebhookOutcome> {
    const trail: WebhookState[] = ['RECEIVED'];
    this.assertSignature(
      envelope.signature,
      envelope.timestamp,
      envelope.nonce,
    );
    trail.push('VERIFIED');

    if (envelope.rawBody.length > MAX_WEBHOOK_BODY_BYTES) {
      this.log.warn(`[webhook] rejected bytes=${envelope.rawBody.length}`);
      throw new ValidationError('Request body too large', {
        bytes: envelope.rawBody.length,
        max: MAX_WEBHOOK_BODY_BYTES,
      });
    }

    let outcome: WebhookOutcome;
    try {
      outcome = await this.forwardToCxone(envelope, trail);
    } catch (err) {
      this.log.error(
        `[webhook] unexpected error=${describeError(err)} kind=${errorKind(err)}`,
      );
      this.metrics.recordFailed('wechat', 'cxone', errorKind(err));
      outcome = { result: 'FAILED', errorKind: errorKind(err), trail };
    }

    trail.push('ACKNOWLEDGED');
    return outcome;
  }

  /**
   * BYOC outbound: agent reply from CXone to the WeChat user. Downstream
   * failures are logged and the post is still acknowledged.
   *
   * @throws ValidationError for a bad post id or payload shape
   * @throws MessageProcessingError when openid or text cannot be extracted
   */
  async handleCxoneMessage(
    postId: string,
    payload: unknown,
  ): Promise<ByocMessageAck> {
    if (!postId || postId.length > MAX_EXTERNAL_ID_LENGTH) {
      throw new ValidationError('Invalid post ID', {
        length: postId.length,
        max: MAX_EXTERNAL_ID_LENGTH,
      });
    }

    const message = normalizeCxonePayload(payload);
    this.metrics.recordReceived('cxone', 'text');
    this.log.log(
      `[byoc] post=${postId} openid=${message.externalId} length=${message.text.length}`,
    );

    try {
      const ack = await this.wechat.sendText(
        message.externalId,
        message.text,
        AbortSignal.timeout(this.requestTimeoutMs),
      );
      this.metrics.recordForwarded('wechat');
      this.log.log(
        `[byoc] delivered openid=${message.externalId} msgid=${ack.msgId}`,
      );
    } catch (err) {
      if (!(err instanceof ExternalApiError)) throw err;
      this.metrics.recordFailed('cxone', 'wechat', errorKind(err));
      this.log.error(
        `[byoc] WeChat delivery failed openid=${message.externalId} ` +
          `error=${describeError(err)} kind=${errorKind(err)}`,
      );
    }

    return { idOnExternalPlatform: randomUUID() };
  }

  private assertSignature(
    signature: string,
    timestamp: string,
    nonce: string,
  ): void {
    if (!this.verifier.verify(signature, timestamp, nonce)) {
      this.log.warn(
        `[signature] rejected signature=${redact(signature)} ` +
          `timestamp=${timestamp} nonce=${redact(nonce)}`,
      );
      throw new ValidationError('Invalid WeChat signature');
    }
  }

  private async forwardToCxone(
    envelope: WebhookEnvelope,
    trail: WebhookState[],
  ): Promise<WebhookOutcome> {
    const opened = this.verifier.open(
      envelope.rawBody.toString('utf8'),
      envelope.msgSignature,
      envelope.timestamp,
      envelope.nonce,
    );
    if (!opened.ok) {
      return this.drop('DECRYPT_FAILED', trail, opened.error);
    }

    let message: InboundMessage;
    try {
      message = parseWeChatMessage(opened.xml);
    } catch (err) {
      return this.drop('PARSE_FAILED', trail, describeError(err));
    }
    this.metrics.recordReceived('wechat', message.type);

    if (message.type !== 'text') {
      return this.drop('UNSUPPORTED_TYPE', trail, `type=${message.type}`);
    }
    const normalized = normalizeWeChatMessage(message);
    if (!normalized) {
      return this.drop('MISSING_FIELDS', trail, `msgid=${message.id}`);
    }
    trail.push('NORMALIZED');

    const { externalId, text } = normalized;
    try {
      const ack = await this.cxone.postInbound(
        externalId,
        text,
        AbortSignal.timeout(this.requestTimeoutMs),
      );
      trail.push('FORWARDED');
      this.metrics.recordForwarded('cxone');
      this.log.log(
        `[webhook] forwarded openid=${externalId} cxone_id=${ack.id}`,
      );
      return { result: 'FORWARDED', externalId, trail };
    } catch (err) {
      this.metrics.recordFailed('wechat', 'cxone', errorKind(err));
      this.log.error(
        `[webhook] forward failed openid=${externalId} ` +
          `error=${describeError(err)} kind=${errorKind(err)}`,
      );
      return { result: 'FAILED', externalId, errorKind: errorKind(err), trail };
    }
  }

  private drop(
    reason: DropReason,
    trail: WebhookState[],
    context: string,
  ): WebhookOutcome {
    trail.push('DROPPED');
    this.log.warn(`[webhook] dropped reason=${reason} ${context}`);
    return { result: 'DROPPED', reason, trail };
  }
}
