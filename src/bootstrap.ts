import type { NestExpressApplication } from '@nestjs/platform-express';
import { ConfigService } from '@nestjs/config';
import { MAX_WEBHOOK_BODY_BYTES } from './bridge/contracts';
import { ApplicationExceptionFilter } from './common/filters/application-exception.filter';
import { createValidationPipe } from './common/pipes/validation.pipe';
import { readString } from './config/config.helpers';

/**
 * HTTP-level setup shared by main.ts and the e2e tests. The application
 * must be created with `rawBody: true`.
 */
export function configureApp(app: NestExpressApplication): void {
  const cfg = app.get(ConfigService);
  const corsOrigins = readString(cfg, 'CORS_ORIGINS')
    .split(',')
    .map((o) => o.trim())
    .filter(Boolean);

  app.enableCors({
    origin: corsOrigins.length ? corsOrigins : true,
    credentials: true,
  });

  // WeChat pushes XML; larger uploads are cut off while streaming
  app.useBodyParser('text', {
    type: ['text/xml', 'application/xml', 'text/plain'],
    limit: MAX_WEBHOOK_BODY_BYTES,
  });

  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new ApplicationExceptionFilter());
  app.enableShutdownHooks();
}
