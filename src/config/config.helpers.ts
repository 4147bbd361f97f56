import { ConfigService } from '@nestjs/config';

// Validated env values arrive typed; process.env fallbacks arrive as strings.

export function readBoolean(
  cfg: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const value = cfg.get<unknown>(key);
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
  }
  return fallback;
}

export function readNumber(
  cfg: ConfigService,
  key: string,
  fallback: number,
): number {
  const value = cfg.get<unknown>(key);
  const parsed = typeof value === 'string' ? Number(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed)
    ? parsed
    : fallback;
}

export function readString(
  cfg: ConfigService,
  key: string,
  fallback = '',
): string {
  const value = cfg.get<unknown>(key);
  return typeof value === 'string' ? value : fallback;
}

export function requireString(cfg: ConfigService, key: string): string {
  const value = readString(cfg, key).trim();
  if (!value) {
    throw new Error(`${key} is not configured`);
  }
  return value;
}
