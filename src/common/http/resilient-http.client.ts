import { HttpStatus, Logger } from '@nestjs/common';
import axios, {
  AxiosAdapter,
  AxiosInstance,
  AxiosResponse,
  Method,
} from 'axios';
import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import {
  describeError,
  ExternalApiError,
} from '../errors/application.errors';
import {
  CircuitBreaker,
  CircuitOpenError,
  CircuitState,
  CircuitStateListener,
  RetryExhaustedError,
  RetryOptions,
  withRetry,
} from '../utils/resilience';

const MAX_ERROR_BODY_LENGTH = 500;
const MAX_SOCKETS = 20;
const MAX_FREE_SOCKETS = 10;

export interface ResilientHttpClientOptions {
  /** Label used in logs, metrics and error details. */
  name: string;
  baseUrl: string;
  timeoutMs: number;
  maxAttempts: number;
  failureThreshold: number;
  resetTimeoutMs: number;
  retry?: Partial<
    Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter' | 'sleep'>
  >;
  onStateChange?: CircuitStateListener;
  onCallComplete?: (outcome: 'success' | 'failure', durationMs: number) => void;
  now?: () => number;
  /** Replaces axios' network adapter, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
}

export interface HttpRequest {
  method: Method;
  path: string;
  body?: unknown;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * HTTP client bound to one downstream base URL.
 *
 * Every call goes through the client's own circuit breaker and a bounded
 * retry loop. 4xx answers are returned to the caller as non-retryable
 * ExternalApiErrors; network errors, timeouts and 5xx are retried with
 * exponential backoff. All failures leave this class as ExternalApiError.
 */
export class ResilientHttpClient {
  private readonly log: Logger;
  private readonly http: AxiosInstance;
  private readonly breaker: CircuitBreaker;
  private readonly httpAgent: HttpAgent;
  private readonly httpsAgent: HttpsAgent;
  readonly baseUrl: string;

  constructor(private readonly options: ResilientHttpClientOptions) {
    this.log = new Logger(`${ResilientHttpClient.name}:${options.name}`);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');

    const agentOptions = {
      keepAlive: true,
      maxSockets: MAX_SOCKETS,
      maxFreeSockets: MAX_FREE_SOCKETS,
    };
    this.httpAgent = new HttpAgent(agentOptions);
    this.httpsAgent = new HttpsAgent(agentOptions);

    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      ...(options.adapter && { adapter: options.adapter }),
    });

    this.breaker = new CircuitBreaker(options.name, {
      failureThreshold: options.failureThreshold,
      resetTimeoutMs: options.resetTimeoutMs,
      isFailure: countsAsOutage,
      now: options.now,
      onStateChange: (from, to, name) => {
        this.log.warn(
          `[circuit] state change ${from} -> ${to} base_url=${this.baseUrl}`,
        );
        options.onStateChange?.(from, to, name);
      },
    });
  }

  get name(): string {
    return this.options.name;
  }

  getCircuitState(): CircuitState {
    return this.breaker.getState();
  }

  async call<T>(request: HttpRequest): Promise<AxiosResponse<T>> {
    const started = Date.now();
    try {
      const response = await withRetry(
        () => this.breaker.execute(() => this.dispatch<T>(request)),
        {
          ...this.options.retry,
          maxAttempts: this.options.maxAttempts,
          signal: request.signal,
          shouldRetry: isRetryable,
          onRetry: (error, attempt, delayMs) =>
            this.log.warn(
              `[call] ${request.method} ${request.path} ` +
                `attempt ${attempt}/${this.options.maxAttempts} failed: ` +
                `${describeAxiosFailure(error)}; retrying in ${delayMs}ms`,
            ),
        },
      );
      this.options.onCallComplete?.('success', Date.now() - started);
      return response;
    } catch (error) {
      this.options.onCallComplete?.('failure', Date.now() - started);
      throw this.toExternalError(error, request);
    }
  }

  post<T>(
    path: string,
    body: unknown,
    extra: Omit<HttpRequest, 'method' | 'path' | 'body'> = {},
  ): Promise<AxiosResponse<T>> {
    return this.call<T>({ ...extra, method: 'POST', path, body });
  }

  get<T>(
    path: string,
    extra: Omit<HttpRequest, 'method' | 'path' | 'body'> = {},
  ): Promise<AxiosResponse<T>> {
    return this.call<T>({ ...extra, method: 'GET', path });
  }

  /** Releases pooled sockets. */
  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private dispatch<T>(request: HttpRequest): Promise<AxiosResponse<T>> {
    return this.http.request<T>({
      method: request.method,
      url: request.path,
      data: request.body,
      headers: request.headers,
      params: request.params,
      signal: request.signal,
    });
  }

  private toExternalError(
    error: unknown,
    request: HttpRequest,
  ): ExternalApiError {
    const service = this.options.name;

    if (error instanceof ExternalApiError) return error;

    if (request.signal?.aborted) {
      return new ExternalApiError(
        `Request to ${this.baseUrl} was aborted: request time budget exceeded`,
        service,
        HttpStatus.GATEWAY_TIMEOUT,
        { path: request.path },
        error,
      );
    }

    if (error instanceof CircuitOpenError) {
      return new ExternalApiError(
        `Circuit breaker is open for ${this.baseUrl}`,
        service,
        HttpStatus.SERVICE_UNAVAILABLE,
        { retryAfterMs: error.retryAfterMs },
        error,
      );
    }

    const status = responseStatus(error);
    if (status !== undefined && status >= 400 && status < 500) {
      return new ExternalApiError(
        `Client error from ${this.baseUrl}: ${status}`,
        service,
        status,
        { response: truncatedBody(error) },
        error,
      );
    }

    if (error instanceof RetryExhaustedError) {
      return new ExternalApiError(
        `Request to ${this.baseUrl} failed after ${error.attempts} retries`,
        service,
        HttpStatus.BAD_GATEWAY,
        { lastError: describeAxiosFailure(error.lastError) },
        error.lastError,
      );
    }

    return new ExternalApiError(
      `Request to ${this.baseUrl} failed: ${describeAxiosFailure(error)}`,
      service,
      HttpStatus.BAD_GATEWAY,
      {},
      error,
    );
  }
}

function responseStatus(error: unknown): number | undefined {
  return axios.isAxiosError(error) ? error.response?.status : undefined;
}

function isCanceled(error: unknown): boolean {
  return (
    axios.isCancel(error) ||
    (axios.isAxiosError(error) && error.code === 'ERR_CANCELED')
  );
}

/** Network errors, timeouts and 5xx are worth another attempt. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof CircuitOpenError) return false;
  if (isCanceled(error)) return false;
  if (!axios.isAxiosError(error)) return false;
  const status = error.response?.status;
  return status === undefined || status >= 500;
}

/** A 4xx proves the downstream is up; a cancellation is the caller's doing. */
function countsAsOutage(error: unknown): boolean {
  if (isCanceled(error)) return false;
  const status = responseStatus(error);
  return status === undefined || status >= 500;
}

function truncatedBody(error: unknown): string {
  if (!axios.isAxiosError(error) || !error.response) return '';
  const data: unknown = error.response.data;
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.slice(0, MAX_ERROR_BODY_LENGTH);
}

function describeAxiosFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) return `HTTP ${status}`;
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }
  return describeError(error);
}
