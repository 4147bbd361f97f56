import { plainToInstance, Transform, Type } from 'class-transformer';
import type { TransformFnParams } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Length,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';

function toBoolean({ obj, key }: TransformFnParams): boolean {
  const raw: unknown = obj[key];
  if (typeof raw === 'boolean') return raw;
  return ['true', '1', 'yes'].includes(String(raw).trim().toLowerCase());
}

const needsUpstreams = (env: EnvironmentVariables) => !env.MOCK_MODE;

/**
 * Shape of the process environment. Numbers and booleans are converted
 * here so ConfigService hands out typed values.
 */
export class EnvironmentVariables {
  // --- BYOC OAuth ---
  @IsString()
  @IsNotEmpty()
  CLIENT_ID!: string;

  @IsString()
  @IsNotEmpty()
  CLIENT_SECRET!: string;

  @IsString()
  @IsNotEmpty()
  JWT_SECRET!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT = 3000;

  // --- WeChat Service Account ---
  @IsString()
  @IsNotEmpty()
  WECHAT_TOKEN!: string;

  @ValidateIf(needsUpstreams)
  @IsString()
  @IsNotEmpty()
  WECHAT_APPID!: string;

  @ValidateIf(needsUpstreams)
  @IsString()
  @IsNotEmpty()
  WECHAT_APPSECRET!: string;

  // 43 base64 characters when set; empty means plaintext mode
  @ValidateIf((env: EnvironmentVariables) => env.WECHAT_ENCODING_AES_KEY !== '')
  @IsString()
  @Length(43, 43)
  WECHAT_ENCODING_AES_KEY = '';

  @IsUrl({ require_tld: false })
  WECHAT_API_BASE = 'https://api.weixin.qq.com';

  @Transform(toBoolean)
  @IsBoolean()
  WECHAT_DECRYPT_FALLBACK = true;

  // --- CXone Digital Engagement ---
  @ValidateIf(needsUpstreams)
  @IsUrl({ require_tld: false })
  CXONE_BASE_URL!: string;

  @ValidateIf(needsUpstreams)
  @IsString()
  @IsNotEmpty()
  CXONE_BEARER_TOKEN!: string;

  @ValidateIf(needsUpstreams)
  @IsString()
  @IsNotEmpty()
  CXONE_CHANNEL_ID!: string;

  // --- Runtime ---
  @Transform(toBoolean)
  @IsBoolean()
  MOCK_MODE = false;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  HTTP_TIMEOUT_MS = 30_000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(10)
  HTTP_MAX_RETRIES = 3;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  CIRCUIT_FAILURE_THRESHOLD = 5;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  CIRCUIT_RESET_TIMEOUT_MS = 60_000;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  REQUEST_TIMEOUT_MS = 30_000;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  RATE_LIMIT_MAX = 60;

  @Type(() => Number)
  @IsInt()
  @Min(1000)
  RATE_LIMIT_WINDOW_MS = 60_000;

  @IsOptional()
  @IsString()
  REDIS_URL?: string;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;

  @Transform(toBoolean)
  @IsBoolean()
  METRICS_ENABLED = true;
}

export function validate(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors
      .map(
        (e) =>
          `- ${e.property}: ${Object.values(e.constraints ?? {}).join(', ')}`,
      )
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }

  return validated;
}
