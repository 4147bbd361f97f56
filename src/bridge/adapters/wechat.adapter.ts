import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  describeError,
  errorKind,
  ExternalApiError,
  WeChatApiError,
} from '../../common/errors/application.errors';
import { HttpClientFactory } from '../../common/http/http-client.factory';
import { ResilientHttpClient } from '../../common/http/resilient-http.client';
import { raceAbort } from '../../common/utils/resilience';
import { readString, requireString } from '../../config/config.helpers';
import { WeChatSendAck, WeChatSender } from '../contracts';
import {
  assertDeliverable,
  isRecord,
} from '../normalizer/payload-normalizer';

const DEFAULT_API_BASE = 'https://api.weixin.qq.com';
// Refresh the access token this long before WeChat expires it
const TOKEN_EXPIRY_SKEW_MS = 5 * 60_000;
const DEFAULT_TOKEN_TTL_SECONDS = 7200;
// access_token invalid / invalid credential / access_token expired
const STALE_TOKEN_CODES = new Set([40001, 40014, 42001]);

function errcodeOf(data: unknown): number {
  return isRecord(data) && typeof data.errcode === 'number' ? data.errcode : 0;
}

function failureStatus(err: unknown, signal?: AbortSignal): number {
  if (err instanceof ExternalApiError) return err.getStatus();
  return signal?.aborted ? HttpStatus.GATEWAY_TIMEOUT : HttpStatus.BAD_GATEWAY;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

/**
 * Sends customer-service text messages to a WeChat user through the
 * official account API.
 */
@Injectable()
export class WeChatAdapter implements WeChatSender {
  private readonly log = new Logger(WeChatAdapter.name);
  private readonly http: ResilientHttpClient;
  private readonly appId: string;
  private readonly appSecret: string;
  private cachedToken: CachedToken | null = null;
  private pendingToken: Promise<string> | null = null;

  constructor(cfg: ConfigService, httpClients: HttpClientFactory) {
    this.appId = requireString(cfg, 'WECHAT_APPID');
    this.appSecret = requireString(cfg, 'WECHAT_APPSECRET');
    this.http = httpClients.create(
      'wechat',
      readString(cfg, 'WECHAT_API_BASE', DEFAULT_API_BASE) || DEFAULT_API_BASE,
    );
  }

  async sendText(
    externalId: string,
    text: string,
    signal?: AbortSignal,
  ): Promise<WeChatSendAck> {
    assertDeliverable(externalId, text);

    this.log.log(`[sendText] openid=${externalId} length=${text.length}`);

    try {
      let data = await this.postText(externalId, text, signal);
      if (STALE_TOKEN_CODES.has(errcodeOf(data))) {
        this.log.warn(
          `[sendText] access token rejected errcode=${errcodeOf(data)}, ` +
            `retrying openid=${externalId} with a fresh token`,
        );
        this.cachedToken = null;
        data = await this.postText(externalId, text, signal);
      }
      const body = this.assertOk(data, 'send');

      const msgId =
        typeof body.msgid === 'number' || typeof body.msgid === 'string'
          ? String(body.msgid)
          : null;
      this.log.log(`[sendText] sent openid=${externalId} msgid=${msgId}`);
      return { msgId };
    } catch (err) {
      this.log.error(
        `[sendText] failed openid=${externalId} ` +
          `error=${describeError(err)} kind=${errorKind(err)}`,
      );

      if (err instanceof WeChatApiError) throw err;
      throw new WeChatApiError(
        `Failed to send message to WeChat: ${describeError(err)}`,
        failureStatus(err, signal),
        { openid: externalId, error: describeError(err), kind: errorKind(err) },
        err,
      );
    }
  }

  private async postText(
    externalId: string,
    text: string,
    signal?: AbortSignal,
  ): Promise<unknown> {
    // The refresh is shared, so only this caller stops waiting on abort
    const token = await raceAbort(this.accessToken(), signal);
    const { data } = await this.http.post<unknown>(
      '/cgi-bin/message/custom/send',
      { touser: externalId, msgtype: 'text', text: { content: text } },
      { params: { access_token: token }, signal },
    );
    return data;
  }

  /** Cached access token; concurrent callers share one refresh. */
  private accessToken(): Promise<string> {
    if (this.cachedToken && Date.now() < this.cachedToken.expiresAt) {
      return Promise.resolve(this.cachedToken.value);
    }
    if (!this.pendingToken) {
      this.pendingToken = this.fetchAccessToken().finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  private async fetchAccessToken(): Promise<string> {
    const { data } = await this.http.get<unknown>('/cgi-bin/token', {
      params: {
        grant_type: 'client_credential',
        appid: this.appId,
        secret: this.appSecret,
      },
    });
    const body = this.assertOk(data, 'token');

    if (typeof body.access_token !== 'string' || !body.access_token) {
      throw new WeChatApiError('WeChat token response has no access_token');
    }
    const ttlSeconds =
      typeof body.expires_in === 'number'
        ? body.expires_in
        : DEFAULT_TOKEN_TTL_SECONDS;

    this.cachedToken = {
      value: body.access_token,
      expiresAt: Date.now() + ttlSeconds * 1000 - TOKEN_EXPIRY_SKEW_MS,
    };
    this.log.debug(`[accessToken] refreshed ttl=${ttlSeconds}s`);
    return body.access_token;
  }

  /** WeChat answers 200 with a non-zero errcode on failure. */
  private assertOk(data: unknown, operation: string): Record<string, unknown> {
    if (!isRecord(data)) {
      throw new WeChatApiError(`Unexpected WeChat ${operation} response`);
    }

    const errcode = errcodeOf(data);
    if (errcode !== 0) {
      if (STALE_TOKEN_CODES.has(errcode)) {
        this.cachedToken = null;
      }
      const errmsg = typeof data.errmsg === 'string' ? data.errmsg : 'unknown';
      throw new WeChatApiError(
        `WeChat ${operation} failed: ${errcode} ${errmsg}`,
        HttpStatus.BAD_GATEWAY,
        { errcode, errmsg },
      );
    }
    return data;
  }
}
