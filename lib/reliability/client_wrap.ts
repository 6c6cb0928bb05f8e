/**
 * Retry + Circuit Breaker Utility
 *
 * Jittered exponential backoff and a circuit breaker around the calls made
 * to the participant directory and the remote conversation store. Only
 * transient failures (429, 5xx, transport errors) count against a breaker;
 * a rejected request means the source answered.
 */

export enum CircuitState {
  CLOSED = 'closed',
  OPEN = 'open',
  HALF_OPEN = 'half-open',
}

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterFactor: number;
  retryOn: (error: unknown) => boolean;
}

export interface CircuitBreakerConfig {
  name: string;
  failureThreshold: number;
  successThreshold: number;
  openDurationMs: number;
  /** Which errors count toward opening the circuit. */
  countsAsFailure: (error: unknown) => boolean;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime: number | null;
  lastStateChange: number;
  totalRequests: number;
  totalFailures: number;
}

/** Runs one remote call under whatever protection the caller configured. */
export type CallWrapper = <T>(fn: () => Promise<T>) => Promise<T>;

const TRANSIENT_MESSAGES = [
  'rate limit',
  'timeout',
  'econnreset',
  'socket hang up',
  'network',
  'unavailable',
  'deadline exceeded',
];

/**
 * Reads an HTTP-ish status from an error thrown by fetch wrappers or SDKs.
 * Firestore reports gRPC codes as numbers on `code`; those are not HTTP
 * statuses and are ignored here.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

export function is5xxError(error: unknown): boolean {
  const status = statusOf(error);
  return status !== undefined && status >= 500 && status < 600;
}

export function is429Error(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return statusOf(error) === 429 || error.message.toLowerCase().includes('rate limit');
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (is429Error(error) || is5xxError(error)) return true;

  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
}

function backoffDelay(attempt: number, config: RetryConfig): number {
  const capped = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
  const jitter = capped * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CircuitOpenError extends Error {
  constructor(
    public readonly circuitName: string,
    public readonly stats: CircuitBreakerStats,
  ) {
    super(`Circuit breaker '${circuitName}' is open. Too many recent failures.`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private successes = 0;
  private lastFailureTime: number | null = null;
  private lastStateChange = Date.now();
  private totalRequests = 0;
  private totalFailures = 0;
  private probeInFlight = false;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> & Pick<CircuitBreakerConfig, 'name'>) {
    this.config = {
      failureThreshold: 5,
      successThreshold: 2,
      openDurationMs: 30_000,
      countsAsFailure: isRetryableError,
      ...config,
    };
  }

  get name(): string {
    return this.config.name;
  }

  get currentState(): CircuitState {
    return this.state;
  }

  get stats(): CircuitBreakerStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: this.lastStateChange,
      totalRequests: this.totalRequests,
      totalFailures: this.totalFailures,
    };
  }

  /** Whether a call may go out now. In HALF_OPEN only one probe is let through. */
  canExecute(): boolean {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() - this.lastStateChange < this.config.openDurationMs) return false;
      this.transitionTo(CircuitState.HALF_OPEN);
    }
    if (this.state === CircuitState.HALF_OPEN) {
      if (this.probeInFlight) return false;
      this.probeInFlight = true;
    }
    return true;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.canExecute()) {
      throw new CircuitOpenError(this.name, this.stats);
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (this.config.countsAsFailure(error)) {
        this.recordFailure();
      } else {
        this.recordSuccess();
      }
      throw error;
    }
  }

  recordSuccess(): void {
    this.totalRequests++;
    this.probeInFlight = false;

    if (this.state === CircuitState.HALF_OPEN) {
      this.successes++;
      if (this.successes >= this.config.successThreshold) this.transitionTo(CircuitState.CLOSED);
    } else {
      this.failures = 0;
    }
  }

  recordFailure(): void {
    this.totalRequests++;
    this.totalFailures++;
    this.failures++;
    this.lastFailureTime = Date.now();
    this.probeInFlight = false;

    if (this.state === CircuitState.HALF_OPEN || this.failures >= this.config.failureThreshold) {
      this.transitionTo(CircuitState.OPEN);
    }
  }

  private transitionTo(next: CircuitState): void {
    if (this.state === next) return;
    console.log(`[CircuitBreaker:${this.config.name}] ${this.state} -> ${next}`);
    this.state = next;
    this.lastStateChange = Date.now();
    this.probeInFlight = false;
    this.successes = 0;
    if (next === CircuitState.CLOSED) this.failures = 0;
  }
}

export async function withRetry<T>(fn: () => Promise<T>, config: Partial<RetryConfig> = {}): Promise<T> {
  const opts: RetryConfig = {
    maxRetries: 3,
    baseDelayMs: 1000,
    maxDelayMs: 30_000,
    jitterFactor: 0.3,
    retryOn: isRetryableError,
    ...config,
  };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxRetries || !opts.retryOn(error)) throw error;

      const delayMs = backoffDelay(attempt, opts);
      console.log(`[withRetry] Attempt ${attempt + 1} failed, retrying in ${delayMs}ms...`);
      await sleep(delayMs);
    }
  }
}

export function withCircuitBreaker<T>(fn: () => Promise<T>, breaker: CircuitBreaker): Promise<T> {
  return breaker.execute(fn);
}

/** Retries inside the breaker, so an exhausted retry sequence counts once. */
export function withReliability<T>(
  fn: () => Promise<T>,
  breaker: CircuitBreaker,
  retryConfig: Partial<RetryConfig> = {},
): Promise<T> {
  return breaker.execute(() => withRetry(fn, retryConfig));
}

/**
 * Builds the call wrapper for one remote source. Each source gets its own
 * breaker, so an outage of one never blocks calls to the other.
 */
export function createReliableCall(
  breakerConfig: Partial<CircuitBreakerConfig> & Pick<CircuitBreakerConfig, 'name'>,
  retryConfig: Partial<RetryConfig> = {},
): CallWrapper & { breaker: CircuitBreaker } {
  const breaker = new CircuitBreaker(breakerConfig);
  const call = <T>(fn: () => Promise<T>): Promise<T> => withReliability(fn, breaker, retryConfig);
  return Object.assign(call, { breaker });
}

export const wrapRedcap = createReliableCall(
  { name: 'redcap', failureThreshold: 3, successThreshold: 1, openDurationMs: 60_000 },
  { maxRetries: 2, baseDelayMs: 2000, maxDelayMs: 20_000 },
);

export const wrapFirestore = createReliableCall(
  { name: 'firestore', failureThreshold: 5, successThreshold: 2, openDurationMs: 30_000 },
  { maxRetries: 3, baseDelayMs: 500, maxDelayMs: 10_000 },
);
