import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AuthModule } from '../auth/auth.module';
import { HttpClientFactory } from '../common/http/http-client.factory';
import { readBoolean } from '../config/config.helpers';
import { CxoneAdapter } from './adapters/cxone.adapter';
import { MockCxoneAdapter, MockWeChatAdapter } from './adapters/mock.adapters';
import { WeChatAdapter } from './adapters/wechat.adapter';
import { BridgeService } from './bridge.service';
import { ByocController } from './byoc.controller';
import {
  CXONE_POSTER,
  CxonePoster,
  WECHAT_SENDER,
  WeChatSender,
} from './contracts';
import { WeChatController } from './wechat.controller';
import { WebhookVerifier } from './wechat/webhook-verifier.service';

const isMockMode = (cfg: ConfigService) => readBoolean(cfg, 'MOCK_MODE', false);

@Module({
  imports: [AuthModule],
  controllers: [WeChatController, ByocController],
  providers: [
    BridgeService,
    WebhookVerifier,
    {
      provide: WECHAT_SENDER,
      inject: [ConfigService, HttpClientFactory],
      useFactory: (cfg: ConfigService, http: HttpClientFactory): WeChatSender =>
        isMockMode(cfg)
          ? new MockWeChatAdapter()
          : new WeChatAdapter(cfg, http),
    },
    {
      provide: CXONE_POSTER,
      inject: [ConfigService, HttpClientFactory],
      useFactory: (cfg: ConfigService, http: HttpClientFactory): CxonePoster =>
        isMockMode(cfg) ? new MockCxoneAdapter() : new CxoneAdapter(cfg, http),
    },
  ],
  exports: [BridgeService],
})
export class BridgeModule {}
