import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CxoneApiError,
  describeError,
  errorKind,
  ExternalApiError,
} from '../../common/errors/application.errors';
import { HttpClientFactory } from '../../common/http/http-client.factory';
import { ResilientHttpClient } from '../../common/http/resilient-http.client';
import { requireString } from '../../config/config.helpers';
import { CxonePostAck, CxonePoster } from '../contracts';
import {
  assertDeliverable,
  isRecord,
} from '../normalizer/payload-normalizer';

/**
 * Posts inbound messages into a CXone Digital Engagement channel, one
 * thread per WeChat openid.
 */
@Injectable()
export class CxoneAdapter implements CxonePoster {
  private readonly log = new Logger(CxoneAdapter.name);
  private readonly http: ResilientHttpClient;
  private readonly channelId: string;
  private readonly bearerToken: string;

  constructor(cfg: ConfigService, httpClients: HttpClientFactory) {
    this.channelId = requireString(cfg, 'CXONE_CHANNEL_ID');
    this.bearerToken = requireString(cfg, 'CXONE_BEARER_TOKEN');
    this.http = httpClients.create(
      'cxone',
      requireString(cfg, 'CXONE_BASE_URL'),
    );
  }

  async postInbound(
    externalId: string,
    text: string,
    signal?: AbortSignal,
  ): Promise<CxonePostAck> {
    assertDeliverable(externalId, text);

    const path = `/channels/${encodeURIComponent(this.channelId)}/messages`;
    const payload = {
      thread: { idOnExternalPlatform: externalId },
      message: { text, type: 'text' },
      direction: 'inbound',
    };

    this.log.log(
      `[postInbound] openid=${externalId} channel=${this.channelId} length=${text.length}`,
    );

    try {
      const { data } = await this.http.post<unknown>(path, payload, {
        headers: {
          Authorization: `Bearer ${this.bearerToken}`,
          'Content-Type': 'application/json',
        },
        signal,
      });

      const ack = this.toAck(data, externalId);
      this.log.log(
        `[postInbound] posted openid=${externalId} id=${ack.id} status=${ack.status}`,
      );
      return ack;
    } catch (err) {
      this.log.error(
        `[postInbound] failed openid=${externalId} ` +
          `error=${describeError(err)} kind=${errorKind(err)}`,
      );

      if (err instanceof CxoneApiError) throw err;
      throw new CxoneApiError(
        `Failed to post message to CXone: ${describeError(err)}`,
        err instanceof ExternalApiError ? err.getStatus() : HttpStatus.BAD_GATEWAY,
        { openid: externalId, error: describeError(err), kind: errorKind(err) },
        err,
      );
    }
  }

  private toAck(data: unknown, externalId: string): CxonePostAck {
    if (!isRecord(data)) {
      throw new CxoneApiError('Unexpected CXone response body');
    }
    const id = data.id;
    const thread = isRecord(data.thread) ? data.thread : undefined;
    const threadId = thread?.idOnExternalPlatform;

    return {
      id: typeof id === 'string' || typeof id === 'number' ? String(id) : '',
      status: typeof data.status === 'string' ? data.status : 'unknown',
      thread: {
        idOnExternalPlatform:
          typeof threadId === 'string' ? threadId : externalId,
      },
    };
  }
}
