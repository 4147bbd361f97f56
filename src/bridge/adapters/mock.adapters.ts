import { Logger } from '@nestjs/common';
import {
  CxonePostAck,
  CxonePoster,
  NormalizedMessage,
  WeChatSendAck,
  WeChatSender,
} from '../contracts';
import { assertDeliverable } from '../normalizer/payload-normalizer';

// MOCK_MODE stand-ins: record what would have been sent and answer like
// the real platforms would.

export class MockWeChatAdapter implements WeChatSender {
  private readonly log = new Logger(MockWeChatAdapter.name);
  readonly sent: NormalizedMessage[] = [];

  async sendText(externalId: string, text: string): Promise<WeChatSendAck> {
    assertDeliverable(externalId, text);
    this.sent.push({ externalId, text });
    this.log.log(`[MOCK] Would send WeChat message to ${externalId}: ${text}`);
    return { msgId: `mock_msgid_${this.sent.length}` };
  }
}

export class MockCxoneAdapter implements CxonePoster {
  private readonly log = new Logger(MockCxoneAdapter.name);
  readonly posted: NormalizedMessage[] = [];

  async postInbound(externalId: string, text: string): Promise<CxonePostAck> {
    assertDeliverable(externalId, text);
    this.posted.push({ externalId, text });
    this.log.log(
      `[MOCK] Would post to CXone for openid ${externalId}: ${text}`,
    );
    return {
      id: `mock_cxone_msg_${this.posted.length}`,
      status: 'created',
      thread: { idOnExternalPlatform: externalId },
    };
  }
}
