import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from 'prom-client';
import type { CircuitState } from '../common/utils/resilience';
import { readBoolean } from '../config/config.helpers';

export type MessageSource = 'wechat' | 'cxone';

const CIRCUIT_STATE_VALUE: Record<CircuitState, number> = {
  CLOSED: 0,
  OPEN: 1,
  HALF_OPEN: 2,
};

/**
 * Prometheus metrics for the bridge. Each instance owns its registry so
 * several application instances (e.g. in tests) never collide.
 */
@Injectable()
export class MetricsService {
  private readonly log = new Logger(MetricsService.name);
  private readonly register = new Registry();

  readonly messagesReceived: Counter<'source' | 'type'>;
  readonly messagesSent: Counter<'destination' | 'status'>;
  readonly messagesFailed: Counter<'source' | 'destination' | 'error_type'>;
  readonly externalApiDuration: Histogram<'service' | 'outcome'>;
  readonly circuitState: Gauge<'service'>;

  constructor(cfg: ConfigService) {
    if (readBoolean(cfg, 'METRICS_ENABLED', true)) {
      collectDefaultMetrics({ register: this.register, prefix: 'bridge_' });
      this.log.log('Default process metrics enabled');
    }

    this.messagesReceived = new Counter({
      name: 'bridge_messages_received_total',
      help: 'Total number of messages received',
      labelNames: ['source', 'type'],
      registers: [this.register],
    });

    this.messagesSent = new Counter({
      name: 'bridge_messages_sent_total',
      help: 'Total number of messages sent',
      labelNames: ['destination', 'status'],
      registers: [this.register],
    });

    this.messagesFailed = new Counter({
      name: 'bridge_messages_failed_total',
      help: 'Total number of failed messages',
      labelNames: ['source', 'destination', 'error_type'],
      registers: [this.register],
    });

    this.externalApiDuration = new Histogram({
      name: 'bridge_external_api_duration_seconds',
      help: 'External API request duration',
      labelNames: ['service', 'outcome'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
      registers: [this.register],
    });

    this.circuitState = new Gauge({
      name: 'bridge_circuit_breaker_state',
      help: 'Circuit breaker state (0=closed, 1=open, 2=half-open)',
      labelNames: ['service'],
      registers: [this.register],
    });
  }

  recordReceived(source: MessageSource, type: string): void {
    this.messagesReceived.inc({ source, type });
  }

  recordForwarded(destination: MessageSource): void {
    this.messagesSent.inc({ destination, status: 'success' });
  }

  recordFailed(
    source: MessageSource,
    destination: MessageSource,
    errorType: string,
  ): void {
    this.messagesSent.inc({ destination, status: 'failure' });
    this.messagesFailed.inc({ source, destination, error_type: errorType });
  }

  observeExternalCall(
    service: string,
    outcome: 'success' | 'failure',
    seconds: number,
  ): void {
    this.externalApiDuration.observe({ service, outcome }, seconds);
  }

  setCircuitState(service: string, state: CircuitState): void {
    this.circuitState.set({ service }, CIRCUIT_STATE_VALUE[state]);
  }

  get contentType(): string {
    return this.register.contentType;
  }

  getMetrics(): Promise<string> {
    return this.register.metrics();
  }
}
