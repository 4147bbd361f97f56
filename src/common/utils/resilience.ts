/**
 * Resilience utilities for handling transient failures.
 *
 * Features:
 * - Retry with exponential backoff (optional jitter, abortable)
 * - Circuit breaker pattern with a single half-open trial call
 * - Rate limiting helpers
 */

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: boolean;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 2_000,
  maxDelayMs: 10_000,
  jitter: false,
};

/** Every attempt failed with a retryable error. */
export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
    public readonly totalDelayMs: number,
  ) {
    super(
      `Failed after ${attempts} attempts: ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Delay before the attempt that follows `attempt` (1-based):
 * base, 2·base, 4·base … capped at maxDelayMs. With jitter the delay is
 * drawn from [delay/2, delay].
 */
export function computeBackoff(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const delay = Math.min(
    options.baseDelayMs * Math.pow(2, attempt - 1),
    options.maxDelayMs,
  );
  if (!options.jitter) return delay;
  return Math.round(delay / 2 + random() * (delay / 2));
}

/**
 * Retries an async operation with exponential backoff.
 *
 * Non-retryable errors (per `shouldRetry`) are rethrown as they are.
 * When every attempt fails a RetryExhaustedError wraps the last one.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const pause = opts.sleep ?? sleep;
  let lastError: unknown;
  let totalDelayMs = 0;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    throwIfAborted(opts.signal);
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.shouldRetry && !opts.shouldRetry(error)) {
        throw error;
      }

      // Don't wait after the last attempt
      if (attempt < opts.maxAttempts) {
        const delay = computeBackoff(attempt, opts);
        opts.onRetry?.(error, attempt, delay);
        totalDelayMs += delay;
        await pause(delay, opts.signal);
      }
    }
  }

  throw new RetryExhaustedError(opts.maxAttempts, lastError, totalDelayMs);
}

/**
 * Circuit breaker state machine.
 *
 * States:
 * - CLOSED: Normal operation, requests pass through
 * - OPEN: Failures reached the threshold, requests fail fast
 * - HALF_OPEN: Cool-down elapsed, one trial request is in flight
 *
 * Every transition happens synchronously between two awaits, so
 * concurrent callers on the event loop always see a consistent state.
 */
export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export type CircuitStateListener = (
  from: CircuitState,
  to: CircuitState,
  name: string,
) => void;

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeoutMs: number;
  /** Errors for which this returns false leave the failure count alone. */
  isFailure?: (error: unknown) => boolean;
  onStateChange?: CircuitStateListener;
  now?: () => number;
}

const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeoutMs: 60_000,
};

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private lastFailureTime = 0;
  private trialInFlight = false;
  private readonly options: CircuitBreakerOptions;
  private readonly now: () => number;

  constructor(
    private readonly name: string,
    options: Partial<CircuitBreakerOptions> = {},
  ) {
    this.options = { ...DEFAULT_CIRCUIT_OPTIONS, ...options };
    this.now = this.options.now ?? Date.now;
  }

  /**
   * Executes an operation through the circuit breaker.
   *
   * @throws CircuitOpenError if the circuit is open or a half-open trial
   * is already running; `fn` is not called in that case.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    const isTrial = this.admit();

    try {
      const result = await fn();
      this.onSuccess(isTrial);
      return result;
    } catch (error) {
      const counts = this.options.isFailure?.(error) ?? true;
      if (counts) {
        this.onFailure(isTrial);
      } else {
        this.onSuccess(isTrial);
      }
      throw error;
    }
  }

  /** Returns true when the admitted call is the half-open trial. */
  private admit(): boolean {
    if (this.state === 'OPEN') {
      const timeSinceFailure = this.now() - this.lastFailureTime;
      if (timeSinceFailure < this.options.resetTimeoutMs) {
        throw new CircuitOpenError(
          this.name,
          this.options.resetTimeoutMs - timeSinceFailure,
        );
      }
      this.transition('HALF_OPEN');
    }

    if (this.state === 'HALF_OPEN') {
      if (this.trialInFlight) {
        throw new CircuitOpenError(this.name, 0);
      }
      this.trialInFlight = true;
      return true;
    }

    return false;
  }

  private onSuccess(isTrial: boolean): void {
    if (isTrial) {
      this.trialInFlight = false;
      this.failures = 0;
      this.transition('CLOSED');
    } else if (this.state === 'CLOSED') {
      this.failures = 0;
    }
  }

  private onFailure(isTrial: boolean): void {
    this.failures++;
    this.lastFailureTime = this.now();

    if (isTrial) {
      // Failed during recovery, back to OPEN with a fresh cool-down
      this.trialInFlight = false;
      this.transition('OPEN');
    } else if (
      this.state === 'CLOSED' &&
      this.failures >= this.options.failureThreshold
    ) {
      this.transition('OPEN');
    }
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    this.options.onStateChange?.(from, to, this.name);
  }

  getState(): CircuitState {
    return this.state;
  }

  getStats(): { state: CircuitState; failures: number } {
    return { state: this.state, failures: this.failures };
  }
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly retryAfterMs: number,
  ) {
    super(
      `Circuit breaker '${circuitName}' is open. Retry after ${retryAfterMs}ms`,
    );
    this.name = 'CircuitOpenError';
  }
}

/**
 * Simple in-memory rate limiter using sliding window.
 * Use this as a fallback when Redis is not available.
 */
export class RateLimiter {
  private readonly requests = new Map<string, number[]>();
  private lastSweep: number;

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {
    this.lastSweep = now();
  }

  /** Number of keys with hits still tracked. */
  get size(): number {
    return this.requests.size;
  }

  /**
   * Checks if a request is allowed for the given key. Keys idle for a
   * whole window are swept at most once per window.
   *
   * @param key - Unique identifier (e.g., client id, IP)
   * @returns true if allowed, false if rate limited
   */
  isAllowed(key: string): boolean {
    const now = this.now();
    const windowStart = now - this.windowMs;

    if (now - this.lastSweep >= this.windowMs) {
      this.cleanup(windowStart);
      this.lastSweep = now;
    }

    const timestamps = (this.requests.get(key) ?? []).filter(
      (t) => t > windowStart,
    );

    if (timestamps.length >= this.maxRequests) {
      this.requests.set(key, timestamps);
      return false;
    }

    timestamps.push(now);
    this.requests.set(key, timestamps);
    return true;
  }

  private cleanup(windowStart: number): void {
    for (const [key, timestamps] of this.requests.entries()) {
      const valid = timestamps.filter((t) => t > windowStart);
      if (valid.length === 0) {
        this.requests.delete(key);
      } else {
        this.requests.set(key, valid);
      }
    }
  }
}

/**
 * Interface for async rate limiting (Redis or fallback)
 */
export interface AsyncRateLimiter {
  isAllowed(key: string): Promise<boolean>;
}

/**
 * Creates an async rate limiter that uses Redis via the provided service.
 * Falls back to in-memory if the Redis check fails.
 */
export function createAsyncRateLimiter(
  redisService: {
    rateLimitCheck: (
      key: string,
      max: number,
      windowMs: number,
    ) => Promise<boolean>;
  },
  maxRequests: number,
  windowMs: number,
  onFallback?: (error: unknown) => void,
): AsyncRateLimiter {
  const fallback = new RateLimiter(maxRequests, windowMs);

  return {
    async isAllowed(key: string): Promise<boolean> {
      try {
        return await redisService.rateLimitCheck(key, maxRequests, windowMs);
      } catch (error) {
        onFallback?.(error);
        return fallback.isAllowed(key);
      }
    },
  };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles like `promise`, or rejects with the abort reason as soon as
 * `signal` aborts. The underlying work keeps running.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (!signal) return promise;
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw abortReason(signal);
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}
