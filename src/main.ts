import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './bootstrap';
import { readBoolean, readNumber } from './config/config.helpers';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    rawBody: true,
  });
  configureApp(app);

  const cfg = app.get(ConfigService);
  const port = readNumber(cfg, 'PORT', 3000);
  await app.listen(port, '0.0.0.0');

  const logger = new Logger('Bootstrap');
  logger.log(`WeChat-CXone bridge listening on port ${port}`);
  if (readBoolean(cfg, 'MOCK_MODE', false)) {
    logger.warn('MOCK_MODE is on: no messages leave this process');
  }
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error('Failed to start application', error);
  process.exitCode = 1;
});
