import { ConfigService } from '@nestjs/config';
import {
  CxoneApiError,
  MessageProcessingError,
  ValidationError,
  WeChatApiError,
} from '../common/errors/application.errors';
import { MetricsService } from '../metrics/metrics.service';
import { BridgeService } from './bridge.service';
import type {
  CxonePostAck,
  WeChatSendAck,
  WebhookEnvelope,
} from './contracts';
import { WeChatCrypto } from './wechat/wechat-crypto';
import { computeSignature } from './wechat/wechat-signature';
import { WebhookVerifier } from './wechat/webhook-verifier.service';

const TOKEN = 'test-token';
const AES_KEY = 'abcdefghijklmnopqrstuvwxyz0123456789ABCDEFG';
const TIMESTAMP = '1700000000';
const NONCE = 'nonce-1';

function wechatXml(fields: Record<string, string>): string {
  const inner = Object.entries(fields)
    .map(([k, v]) => `<${k}><![CDATA[${v}]]></${k}>`)
    .join('');
  return `<xml>${inner}</xml>`;
}

const TEXT_XML = wechatXml({
  ToUserName: 'gh_service',
  FromUserName: 'o-user-1',
  MsgType: 'text',
  Content: 'hello',
});

function envelope(body: string | Buffer, extra: Partial<WebhookEnvelope> = {}): WebhookEnvelope {
  return {
    signature: computeSignature(TOKEN, TIMESTAMP, NONCE),
    timestamp: TIMESTAMP,
    nonce: NONCE,
    rawBody: typeof body === 'string' ? Buffer.from(body, 'utf8') : body,
    ...extra,
  };
}

function setup(settings: Record<string, unknown> = {}) {
  const cfg = new ConfigService({
    WECHAT_TOKEN: TOKEN,
    WECHAT_APPID: 'wx-test-app',
    REQUEST_TIMEOUT_MS: 5_000,
    METRICS_ENABLED: false,
    ...settings,
  });
  const wechat = {
    sendText: jest.fn<Promise<WeChatSendAck>, [string, string, AbortSignal?]>(),
  };
  const cxone = {
    postInbound: jest.fn<Promise<CxonePostAck>, [string, string, AbortSignal?]>(),
  };
  wechat.sendText.mockResolvedValue({ msgId: '1001' });
  cxone.postInbound.mockResolvedValue({ id: 'cx-1', status: 'created' });

  const service = new BridgeService(
    cfg,
    new WebhookVerifier(cfg),
    new MetricsService(cfg),
    wechat,
    cxone,
  );
  return { service, wechat, cxone };
}

describe('BridgeService.verifyEcho', () => {
  it('returns echostr for a matching signature', () => {
    const { service } = setup();
    const signature = computeSignature(TOKEN, TIMESTAMP, NONCE);

    expect(service.verifyEcho(signature, TIMESTAMP, NONCE, 'echo-123')).toBe('echo-123');
  });

  it('rejects a mismatched signature with 400', () => {
    const { service } = setup();

    expect.assertions(2);
    try {
      service.verifyEcho('0'.repeat(40), TIMESTAMP, NONCE, 'echo-123');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.getStatus()).toBe(400);
    }
  });
});

describe('BridgeService.handleWeChatWebhook', () => {
  it('forwards a text message to CXone', async () => {
    const { service, cxone } = setup();

    const outcome = await service.handleWeChatWebhook(envelope(TEXT_XML));

    expect(cxone.postInbound).toHaveBeenCalledTimes(1);
    expect(cxone.postInbound).toHaveBeenCalledWith('o-user-1', 'hello', expect.any(AbortSignal));
    expect(outcome).toEqual({
      result: 'FORWARDED',
      externalId: 'o-user-1',
      trail: ['RECEIVED', 'VERIFIED', 'NORMALIZED', 'FORWARDED', 'ACKNOWLEDGED'],
    });
  });

  it('throws on a bad signature without touching the body', async () => {
    const { service, cxone } = setup();

    await expect(
      service.handleWeChatWebhook(envelope(TEXT_XML, { signature: 'bad' })),
    ).rejects.toThrow('Invalid WeChat signature');
    expect(cxone.postInbound).not.toHaveBeenCalled();
  });

  it('drops non-text messages', async () => {
    const { service, cxone } = setup();
    const image = wechatXml({ FromUserName: 'o-user-1', MsgType: 'image', PicUrl: 'http://img.invalid/1.jpg' });

    const outcome = await service.handleWeChatWebhook(envelope(image));

    expect(outcome).toEqual({
      result: 'DROPPED',
      reason: 'UNSUPPORTED_TYPE',
      trail: ['RECEIVED', 'VERIFIED', 'DROPPED', 'ACKNOWLEDGED'],
    });
    expect(cxone.postInbound).not.toHaveBeenCalled();
  });

  it('rejects a body over 100000 bytes before parsing', async () => {
    const { service, cxone } = setup();

    const result = service.handleWeChatWebhook(envelope(Buffer.alloc(100_001, 'a')));

    await expect(result).rejects.toBeInstanceOf(ValidationError);
    await expect(result).rejects.toThrow('Request body too large');
    expect(cxone.postInbound).not.toHaveBeenCalled();
  });

  it('accepts a body of exactly 100000 bytes', async () => {
    const { service } = setup();
    const tag = '<Padding></Padding>';
    const filler = 'x'.repeat(100_000 - TEXT_XML.length - tag.length);
    const padded = TEXT_XML.replace('</xml>', `<Padding>${filler}</Padding></xml>`);
    expect(Buffer.byteLength(padded)).toBe(100_000);

    const outcome = await service.handleWeChatWebhook(envelope(padded));

    expect(outcome.result).toBe('FORWARDED');
  });

  it('drops unparseable bodies', async () => {
    const { service } = setup();

    const outcome = await service.handleWeChatWebhook(envelope('<xml><MsgType>text'));

    expect(outcome).toMatchObject({ result: 'DROPPED', reason: 'PARSE_FAILED' });
  });

  it('drops text messages without sender or content', async () => {
    const { service } = setup();
    const noContent = wechatXml({ FromUserName: 'o-user-1', MsgType: 'text' });

    const outcome = await service.handleWeChatWebhook(envelope(noContent));

    expect(outcome).toMatchObject({ result: 'DROPPED', reason: 'MISSING_FIELDS' });
  });

  it('acknowledges even when the CXone post fails', async () => {
    const { service, cxone } = setup();
    cxone.postInbound.mockRejectedValue(new CxoneApiError('Failed to post message to CXone'));

    const outcome = await service.handleWeChatWebhook(envelope(TEXT_XML));

    expect(outcome).toEqual({
      result: 'FAILED',
      externalId: 'o-user-1',
      errorKind: 'CxoneApiError',
      trail: ['RECEIVED', 'VERIFIED', 'NORMALIZED', 'ACKNOWLEDGED'],
    });
  });

  it('aborts a forward that outlives the request budget and still acknowledges', async () => {
    const { service, cxone } = setup({ REQUEST_TIMEOUT_MS: 50 });
    let seen: AbortSignal | undefined;
    cxone.postInbound.mockImplementation(
      (_openid, _text, signal) =>
        new Promise<CxonePostAck>((_resolve, reject) => {
          seen = signal;
          signal?.addEventListener('abort', () =>
            reject(new CxoneApiError('Request to CXone was aborted', 504)),
          );
        }),
    );

    const started = Date.now();
    const outcome = await service.handleWeChatWebhook(envelope(TEXT_XML));

    expect(Date.now() - started).toBeLessThan(1_000);
    expect(seen?.aborted).toBe(true);
    expect(outcome).toEqual({
      result: 'FAILED',
      externalId: 'o-user-1',
      errorKind: 'CxoneApiError',
      trail: ['RECEIVED', 'VERIFIED', 'NORMALIZED', 'ACKNOWLEDGED'],
    });
  });

  it('acknowledges unexpected errors too', async () => {
    const { service, cxone } = setup();
    cxone.postInbound.mockRejectedValue(new TypeError('boom'));

    await expect(service.handleWeChatWebhook(envelope(TEXT_XML))).resolves.toMatchObject({
      result: 'FAILED',
      errorKind: 'TypeError',
    });
  });

  describe('encrypted mode', () => {
    const crypto = new WeChatCrypto(TOKEN, AES_KEY, 'wx-test-app');

    function sealed(xml: string) {
      const encrypted = crypto.encrypt(xml);
      return envelope(wechatXml({ ToUserName: 'gh_service', Encrypt: encrypted }), {
        msgSignature: computeSignature(TOKEN, TIMESTAMP, NONCE, encrypted),
      });
    }

    it('decrypts before forwarding', async () => {
      const { service, cxone } = setup({ WECHAT_ENCODING_AES_KEY: AES_KEY });

      const outcome = await service.handleWeChatWebhook(sealed(TEXT_XML));

      expect(outcome.result).toBe('FORWARDED');
      expect(cxone.postInbound).toHaveBeenCalledWith('o-user-1', 'hello', expect.any(AbortSignal));
    });

    it('falls back to the raw body when decryption fails', async () => {
      const { service, cxone } = setup({ WECHAT_ENCODING_AES_KEY: AES_KEY });

      const outcome = await service.handleWeChatWebhook(envelope(TEXT_XML));

      expect(outcome.result).toBe('FORWARDED');
      expect(cxone.postInbound).toHaveBeenCalledTimes(1);
    });

    it('drops the message when the fallback is disabled', async () => {
      const { service, cxone } = setup({
        WECHAT_ENCODING_AES_KEY: AES_KEY,
        WECHAT_DECRYPT_FALLBACK: false,
      });

      const outcome = await service.handleWeChatWebhook({
        ...sealed(TEXT_XML),
        msgSignature: 'f'.repeat(40),
      });

      expect(outcome).toMatchObject({ result: 'DROPPED', reason: 'DECRYPT_FAILED' });
      expect(cxone.postInbound).not.toHaveBeenCalled();
    });
  });
});

describe('BridgeService.handleCxoneMessage', () => {
  const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

  it('sends the agent reply to WeChat and returns a fresh id', async () => {
    const { service, wechat } = setup();

    const ack = await service.handleCxoneMessage('post-1', {
      thread: { idOnExternalPlatform: 'u1' },
      message: { text: 'hi' },
    });

    expect(wechat.sendText).toHaveBeenCalledTimes(1);
    expect(wechat.sendText).toHaveBeenCalledWith('u1', 'hi', expect.any(AbortSignal));
    expect(ack.idOnExternalPlatform).toMatch(UUID);
  });

  it('still acknowledges when WeChat delivery fails', async () => {
    const { service, wechat } = setup();
    wechat.sendText.mockRejectedValue(new WeChatApiError('Failed to send message to WeChat'));

    const ack = await service.handleCxoneMessage('post-1', { openid: 'u1', text: 'hi' });

    expect(ack.idOnExternalPlatform).toMatch(UUID);
  });

  it('lets unexpected errors through', async () => {
    const { service, wechat } = setup();
    wechat.sendText.mockRejectedValue(new Error('boom'));

    await expect(
      service.handleCxoneMessage('post-1', { openid: 'u1', text: 'hi' }),
    ).rejects.toThrow('boom');
  });

  it('rejects an empty or oversized post id', async () => {
    const { service, wechat } = setup();
    const body = { openid: 'u1', text: 'hi' };

    await expect(service.handleCxoneMessage('', body)).rejects.toThrow('Invalid post ID');
    await expect(service.handleCxoneMessage('p'.repeat(129), body)).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(wechat.sendText).not.toHaveBeenCalled();
  });

  it('fails extraction with 422 and sends nothing', async () => {
    const { service, wechat } = setup();

    await expect(
      service.handleCxoneMessage('post-1', { message: { text: 'hi' } }),
    ).rejects.toBeInstanceOf(MessageProcessingError);
    expect(wechat.sendText).not.toHaveBeenCalled();
  });
});
