import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';
import { readString } from '../config/config.helpers';

// Trim, count and record in one step so concurrent callers cannot all
// pass the count check.
const SLIDING_WINDOW_SCRIPT = `
local key = KEYS[1]
local now = tonumber(ARGV[1])
local window = tonumber(ARGV[2])
redis.call('ZREMRANGEBYSCORE', key, '-inf', now - window)
if redis.call('ZCARD', key) >= tonumber(ARGV[3]) then
  return 0
end
redis.call('ZADD', key, now, ARGV[4])
redis.call('PEXPIRE', key, window)
return 1
`;

export class RedisUnavailableError extends Error {
  constructor() {
    super('Redis is not connected');
    this.name = 'RedisUnavailableError';
  }
}

/**
 * Redis access for shared, cross-instance state (rate-limit windows).
 * Without REDIS_URL every call throws RedisUnavailableError and callers
 * use their in-memory fallback.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private connected = false;

  constructor(private readonly config: ConfigService) {
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = readString(this.config, 'REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 2000);
      },
      lazyConnect: true,
    });

    client.on('connect', () => {
      this.connected = true;
      this.logger.log('Redis connected');
    });

    client.on('error', (err: Error) => {
      this.connected = false;
      this.logger.error('Redis error', err.message);
    });

    client.on('close', () => {
      this.connected = false;
      this.logger.warn('Redis connection closed');
    });

    client.connect().catch((err: unknown) => {
      this.logger.error(
        'Failed to connect to Redis',
        err instanceof Error ? err.message : String(err),
      );
    });

    this.client = client;
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  private requireClient(): Redis {
    if (!this.connected || !this.client) {
      throw new RedisUnavailableError();
    }
    return this.client;
  }

  /**
   * Sliding-window rate limit on a sorted set.
   * Returns false once `maxRequests` hits fall inside the window.
   */
  async rateLimitCheck(
    key: string,
    maxRequests: number,
    windowMs: number,
  ): Promise<boolean> {
    const client = this.requireClient();
    const now = Date.now();
    const member = `${now}-${randomUUID().slice(0, 8)}`;

    const allowed = await client.eval(
      SLIDING_WINDOW_SCRIPT,
      1,
      key,
      String(now),
      String(windowMs),
      String(maxRequests),
      member,
    );
    return allowed === 1;
  }
}
