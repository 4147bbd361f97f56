import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readNumber } from '../../config/config.helpers';
import { MetricsService } from '../../metrics/metrics.service';
import type { CircuitState } from '../utils/resilience';
import {
  ResilientHttpClient,
  ResilientHttpClientOptions,
} from './resilient-http.client';

export type HttpClientOverrides = Partial<
  Omit<ResilientHttpClientOptions, 'name' | 'baseUrl'>
>;

/**
 * Builds one ResilientHttpClient per downstream service from configuration
 * and keeps track of them for health reporting and shutdown.
 */
@Injectable()
export class HttpClientFactory implements OnApplicationShutdown {
  private readonly log = new Logger(HttpClientFactory.name);
  private readonly clients = new Map<string, ResilientHttpClient>();

  constructor(
    private readonly cfg: ConfigService,
    private readonly metrics: MetricsService,
  ) {}

  create(
    name: string,
    baseUrl: string,
    overrides: HttpClientOverrides = {},
  ): ResilientHttpClient {
    if (this.clients.has(name)) {
      throw new Error(`HTTP client '${name}' already exists`);
    }

    const client = new ResilientHttpClient({
      name,
      baseUrl,
      timeoutMs: readNumber(this.cfg, 'HTTP_TIMEOUT_MS', 30_000),
      maxAttempts: readNumber(this.cfg, 'HTTP_MAX_RETRIES', 3),
      failureThreshold: readNumber(this.cfg, 'CIRCUIT_FAILURE_THRESHOLD', 5),
      resetTimeoutMs: readNumber(this.cfg, 'CIRCUIT_RESET_TIMEOUT_MS', 60_000),
      ...overrides,
      onStateChange: (from, to, circuit) => {
        this.metrics.setCircuitState(name, to);
        overrides.onStateChange?.(from, to, circuit);
      },
      onCallComplete: (outcome, durationMs) => {
        this.metrics.observeExternalCall(name, outcome, durationMs / 1000);
        overrides.onCallComplete?.(outcome, durationMs);
      },
    });

    this.metrics.setCircuitState(name, client.getCircuitState());
    this.clients.set(name, client);
    this.log.log(`[create] ${name} -> ${client.baseUrl}`);
    return client;
  }

  circuitStates(): Record<string, CircuitState> {
    const states: Record<string, CircuitState> = {};
    for (const [name, client] of this.clients) {
      states[name] = client.getCircuitState();
    }
    return states;
  }

  onApplicationShutdown(): void {
    for (const client of this.clients.values()) {
      client.close();
    }
    this.clients.clear();
  }
}
