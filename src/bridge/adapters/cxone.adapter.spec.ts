import { ConfigService } from '@nestjs/config';
import {
  fakeAxiosAdapter,
  FakeReply,
} from '../../../test/support/fake-axios-adapter';
import { TestHttpClientFactory } from '../../../test/support/test-http-clients';
import {
  CxoneApiError,
  MessageProcessingError,
} from '../../common/errors/application.errors';
import { CxoneAdapter } from './cxone.adapter';

function setup(replies: FakeReply[]) {
  const fake = fakeAxiosAdapter(replies);
  const cfg = new ConfigService({
    CXONE_BASE_URL: 'http://cxone.invalid',
    CXONE_BEARER_TOKEN: 'test-bearer',
    CXONE_CHANNEL_ID: 'test-channel',
    HTTP_MAX_RETRIES: 1,
    METRICS_ENABLED: false,
  });
  const adapter = new CxoneAdapter(cfg, new TestHttpClientFactory(cfg, fake.adapter));
  return { adapter, calls: fake.calls };
}

describe('CxoneAdapter', () => {
  it('posts an inbound message to the channel thread', async () => {
    const { adapter, calls } = setup([
      { status: 201, data: { id: 'cx-msg-1', status: 'created' } },
    ]);

    await expect(adapter.postInbound('o-user-1', 'hello')).resolves.toEqual({
      id: 'cx-msg-1',
      status: 'created',
      thread: { idOnExternalPlatform: 'o-user-1' },
    });
    expect(calls).toEqual([
      {
        method: 'POST',
        url: '/channels/test-channel/messages',
        params: undefined,
        body: {
          thread: { idOnExternalPlatform: 'o-user-1' },
          message: { text: 'hello', type: 'text' },
          direction: 'inbound',
        },
        authorization: 'Bearer test-bearer',
      },
    ]);
  });

  it('wraps downstream failures in CxoneApiError', async () => {
    const { adapter } = setup([{ status: 502 }]);

    const error = await adapter.postInbound('o-user-1', 'hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CxoneApiError);
    if (!(error instanceof CxoneApiError)) return;
    expect(error.getStatus()).toBe(502);
    expect(error.message).toBe(
      'Failed to post message to CXone: Request to http://cxone.invalid failed after 1 retries',
    );
    expect(error.details.service).toBe('CXone');
  });

  it('rejects a non-object response body', async () => {
    const { adapter } = setup([{ status: 200, data: 'accepted' }]);

    await expect(adapter.postInbound('o-user-1', 'hello')).rejects.toThrow(
      'Unexpected CXone response body',
    );
  });

  it('validates locally before any network call', async () => {
    const { adapter, calls } = setup([]);

    await expect(adapter.postInbound('', 'hello')).rejects.toBeInstanceOf(
      MessageProcessingError,
    );
    expect(calls).toHaveLength(0);
  });
});
