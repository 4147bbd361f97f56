import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Req,
  UseGuards,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtGuard } from '../auth/middleware/jwt.guard';
import type { AuthenticatedRequest } from '../auth/middleware/jwt.guard';
import {
  describeError,
  RateLimitExceededError,
} from '../common/errors/application.errors';
import {
  AsyncRateLimiter,
  createAsyncRateLimiter,
} from '../common/utils/resilience';
import { readNumber } from '../config/config.helpers';
import { RedisKeys } from '../redis/keys';
import { RedisService } from '../redis/redis.service';
import { BridgeService, ByocMessageAck } from './bridge.service';

/** CXone "Bring Your Own Channel" callbacks. */
@Controller('integration/box/1.0')
export class ByocController {
  private readonly log = new Logger(ByocController.name);
  // Per client; Redis-backed with an in-memory fallback
  private readonly rateLimiter: AsyncRateLimiter;

  constructor(
    private readonly bridge: BridgeService,
    redis: RedisService,
    cfg: ConfigService,
  ) {
    const max = readNumber(cfg, 'RATE_LIMIT_MAX', 60);
    const windowMs = readNumber(cfg, 'RATE_LIMIT_WINDOW_MS', 60_000);
    this.rateLimiter = createAsyncRateLimiter(
      redis,
      max,
      windowMs,
      (err) =>
        this.log.debug(`[RateLimit] in-memory fallback: ${describeError(err)}`),
    );
  }

  @Post('posts/:id/messages')
  @UseGuards(JwtGuard)
  @HttpCode(HttpStatus.OK)
  async postMessage(
    @Param('id') postId: string,
    @Body() body: unknown,
    @Req() req: AuthenticatedRequest,
  ): Promise<ByocMessageAck> {
    const clientId = req.clientId ?? 'anonymous';
    if (!(await this.rateLimiter.isAllowed(RedisKeys.rateLimit(clientId)))) {
      this.log.warn(`[RateLimit] Exceeded for client=${clientId}`);
      throw new RateLimitExceededError();
    }

    return this.bridge.handleCxoneMessage(postId, body);
  }
}
