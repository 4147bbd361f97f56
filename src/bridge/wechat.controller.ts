import {
  Controller,
  Get,
  Header,
  HttpCode,
  HttpStatus,
  Post,
  Query,
  Req,
} from '@nestjs/common';
import type { RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';
import { BridgeService } from './bridge.service';
import { EchoQueryDto, WebhookQueryDto } from './dto/webhook-query.dto';

function bodyBytes(req: RawBodyRequest<Request>): Buffer {
  if (req.rawBody) return req.rawBody;
  const body: unknown = req.body;
  return typeof body === 'string' ? Buffer.from(body, 'utf8') : Buffer.alloc(0);
}

@Controller('wechat')
export class WeChatController {
  constructor(private readonly bridge: BridgeService) {}

  @Get('webhook')
  @Header('Content-Type', 'text/plain')
  verify(@Query() query: EchoQueryDto): string {
    return this.bridge.verifyEcho(
      query.signature,
      query.timestamp,
      query.nonce,
      query.echostr,
    );
  }

  // WeChat retries anything that is not a 200, so the body is always empty
  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  async receive(
    @Query() query: WebhookQueryDto,
    @Req() req: RawBodyRequest<Request>,
  ): Promise<void> {
    await this.bridge.handleWeChatWebhook({
      signature: query.signature,
      timestamp: query.timestamp,
      nonce: query.nonce,
      msgSignature: query.msg_signature,
      rawBody: bodyBytes(req),
    });
  }
}
