import { Global, Module } from '@nestjs/common';
import { RedisService } from '../redis/redis.service';
import { HttpClientFactory } from './http/http-client.factory';

/**
 * Process-scoped infrastructure shared by every feature module:
 * downstream HTTP clients and the Redis connection.
 */
@Global()
@Module({
  providers: [HttpClientFactory, RedisService],
  exports: [HttpClientFactory, RedisService],
})
export class CommonModule {}
