import { MessageProcessingError } from '../../common/errors/application.errors';
import { MockCxoneAdapter, MockWeChatAdapter } from './mock.adapters';

describe('mock adapters', () => {
  it('records WeChat sends and numbers their ids', async () => {
    const wechat = new MockWeChatAdapter();

    await expect(wechat.sendText('o-user-1', 'one')).resolves.toEqual({ msgId: 'mock_msgid_1' });
    await expect(wechat.sendText('o-user-2', 'two')).resolves.toEqual({ msgId: 'mock_msgid_2' });
    expect(wechat.sent).toEqual([
      { externalId: 'o-user-1', text: 'one' },
      { externalId: 'o-user-2', text: 'two' },
    ]);
  });

  it('records CXone posts with a synthetic acknowledgment', async () => {
    const cxone = new MockCxoneAdapter();

    await expect(cxone.postInbound('o-user-1', 'hello')).resolves.toEqual({
      id: 'mock_cxone_msg_1',
      status: 'created',
      thread: { idOnExternalPlatform: 'o-user-1' },
    });
  });

  it('applies the same local validation as the real adapters', async () => {
    await expect(new MockWeChatAdapter().sendText('', 'hi')).rejects.toBeInstanceOf(
      MessageProcessingError,
    );
    await expect(new MockCxoneAdapter().postInbound('o-user-1', '')).rejects.toBeInstanceOf(
      MessageProcessingError,
    );
  });
});
