import type { NestExpressApplication } from '@nestjs/platform-express';
import { createHash } from 'crypto';
import request from 'supertest';
import type { CxonePostAck } from '../src/bridge/contracts';
import { CxoneApiError } from '../src/common/errors/application.errors';
import { createTestApp } from './support/create-test-app';

const TIMESTAMP = '1700000000';
const NONCE = 'nonce-1';
// sha1 of the sorted parts: '1700000000' + 'nonce-1' + 'test-token'
const SIGNATURE = createHash('sha1').update('1700000000nonce-1test-token').digest('hex');

const TEXT_XML =
  '<xml><ToUserName><![CDATA[gh_service]]></ToUserName>' +
  '<FromUserName><![CDATA[o-user-1]]></FromUserName>' +
  '<CreateTime>1700000000</CreateTime>' +
  '<MsgType><![CDATA[text]]></MsgType>' +
  '<Content><![CDATA[hello]]></Content>' +
  '<MsgId>1234567890123456</MsgId></xml>';

describe('WeChat webhook (e2e)', () => {
  let app: NestExpressApplication;
  const postInbound = jest.fn<Promise<CxonePostAck>, [string, string, AbortSignal?]>();
  const wechat = { sendText: jest.fn() };

  beforeAll(async () => {
    app = await createTestApp({ cxone: { postInbound }, wechat });
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    postInbound.mockReset();
    postInbound.mockResolvedValue({ id: 'cx-1', status: 'created' });
  });

  describe('GET /wechat/webhook', () => {
    it('echoes echostr for a valid signature', async () => {
      const res = await request(app.getHttpServer())
        .get('/wechat/webhook')
        .query({ signature: SIGNATURE, timestamp: TIMESTAMP, nonce: NONCE, echostr: 'echo-123' })
        .expect(200);

      expect(res.text).toBe('echo-123');
      expect(res.headers['content-type']).toMatch(/^text\/plain/);
    });

    it('answers 400 for a mismatched signature', async () => {
      const res = await request(app.getHttpServer())
        .get('/wechat/webhook')
        .query({ signature: '0'.repeat(40), timestamp: TIMESTAMP, nonce: NONCE, echostr: 'echo-123' })
        .expect(400);

      expect(res.body).toEqual({
        error: 'ValidationError',
        message: 'Invalid WeChat signature',
        details: {},
      });
    });

    it('answers 422 when echostr is missing', async () => {
      await request(app.getHttpServer())
        .get('/wechat/webhook')
        .query({ signature: SIGNATURE, timestamp: TIMESTAMP, nonce: NONCE })
        .expect(422);
    });
  });

  describe('POST /wechat/webhook', () => {
    const push = (xml: string, signature = SIGNATURE) =>
      request(app.getHttpServer())
        .post('/wechat/webhook')
        .query({ signature, timestamp: TIMESTAMP, nonce: NONCE, openid: 'o-user-1' })
        .set('Content-Type', 'text/xml')
        .send(xml);

    it('forwards a text message to CXone and answers with an empty 200', async () => {
      const res = await push(TEXT_XML).expect(200);

      expect(res.text).toBe('');
      expect(postInbound).toHaveBeenCalledTimes(1);
      expect(postInbound).toHaveBeenCalledWith('o-user-1', 'hello', expect.any(AbortSignal));
    });

    it('answers 400 for a bad signature and forwards nothing', async () => {
      await push(TEXT_XML, 'f'.repeat(40)).expect(400);

      expect(postInbound).not.toHaveBeenCalled();
    });

    it('acknowledges unsupported message types without forwarding', async () => {
      const voice = TEXT_XML.replace('<![CDATA[text]]>', '<![CDATA[voice]]>');

      const res = await push(voice).expect(200);

      expect(res.text).toBe('');
      expect(postInbound).not.toHaveBeenCalled();
    });

    it('acknowledges when CXone is down', async () => {
      postInbound.mockRejectedValue(new CxoneApiError('Circuit breaker is open', 503));

      const res = await push(TEXT_XML).expect(200);

      expect(res.text).toBe('');
    });

    it('acknowledges malformed XML', async () => {
      await push('<xml><MsgType>text').expect(200);

      expect(postInbound).not.toHaveBeenCalled();
    });

    it('answers 400 for a body over 100000 bytes without forwarding', async () => {
      const big = TEXT_XML.replace('hello', 'x'.repeat(100_001));

      const res = await push(big).expect(400);

      expect(res.body).toMatchObject({
        error: 'ValidationError',
        message: 'Request body too large',
        details: { max: 100_000 },
      });
      expect(postInbound).not.toHaveBeenCalled();
    });

    it('answers 400 rather than 500 for a multi-megabyte body', async () => {
      const huge = TEXT_XML.replace('hello', 'x'.repeat(2_100_000));

      const res = await push(huge).expect(400);

      expect(res.body.message).toBe('Request body too large');
      expect(postInbound).not.toHaveBeenCalled();
    });
  });
});
