import { Controller, Get } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpClientFactory } from '../common/http/http-client.factory';
import type { CircuitState } from '../common/utils/resilience';
import { readBoolean } from '../config/config.helpers';

export type DependencyStatus = 'ok' | 'degraded' | 'error' | 'mock_mode';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  version: string;
  dependencies: { cxone: DependencyStatus; wechat: DependencyStatus };
}

export const APP_VERSION = '1.0.0';

const STATUS_BY_CIRCUIT: Record<CircuitState, DependencyStatus> = {
  CLOSED: 'ok',
  HALF_OPEN: 'degraded',
  OPEN: 'error',
};

@Controller()
export class HealthController {
  constructor(
    private readonly cfg: ConfigService,
    private readonly httpClients: HttpClientFactory,
  ) {}

  @Get('health')
  health(): HealthReport {
    const mock = readBoolean(this.cfg, 'MOCK_MODE', false);
    const circuits = this.httpClients.circuitStates();
    const statusOf = (name: string): DependencyStatus => {
      if (mock) return 'mock_mode';
      const state = circuits[name];
      return state ? STATUS_BY_CIRCUIT[state] : 'error';
    };

    const dependencies = {
      cxone: statusOf('cxone'),
      wechat: statusOf('wechat'),
    };
    const allUp = Object.values(dependencies).every(
      (s) => s === 'ok' || s === 'mock_mode',
    );

    return {
      status: allUp ? 'healthy' : 'degraded',
      version: APP_VERSION,
      dependencies,
    };
  }

  @Get('ready')
  ready() {
    return { status: 'ready' };
  }

  @Get('live')
  live() {
    return { status: 'alive' };
  }
}
