import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AuthModule } from './auth/auth.module';
import { BridgeModule } from './bridge/bridge.module';
import { CommonModule } from './common/common.module';
import { validate } from './config/env.validation';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    MetricsModule,
    CommonModule,
    AuthModule,
    BridgeModule,
    HealthModule,
  ],
})
export class AppModule {}
