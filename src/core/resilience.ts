import { setTimeout as delay } from "node:timers/promises";
import { FetchError, errorMessage } from "./errors.js";
import { CircuitState, FetchOptions, Result, SourceId } from "./types.js";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  jitterMs: number;
  timeoutMs: number;
}

export interface CircuitBreakerOptions {
  failureThreshold: number;
  coolDownMs: number;
}

export interface ResilienceOptions {
  retry: RetryPolicy;
  breaker: CircuitBreakerOptions;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface SourceHealth {
  source: SourceId;
  circuit: CircuitState;
  exhausted: number;
  circuitOpen: number;
  timeouts: number;
  lastError?: string;
  lastFailureAt?: string;
}

/** Delay before retry `retry` (0-based): `base * 2^retry` plus jitter in `[0, jitterMs)`. */
export function backoffDelay(
  retry: number,
  policy: Pick<RetryPolicy, "baseDelayMs" | "jitterMs">,
  random: () => number = Math.random,
): number {
  return policy.baseDelayMs * 2 ** retry + random() * policy.jitterMs;
}

// ── Circuit breaker ───────────────────────────────────────────

export class CircuitBreaker {
  private state: CircuitState = { state: "closed", consecutiveFailures: 0, openedAt: null };
  private probeInFlight = false;

  constructor(
    private options: CircuitBreakerOptions,
    private now: () => number = Date.now,
  ) {}

  /**
   * Whether a call may go through right now. In the half-open state the
   * first caller claims the single probe slot; everyone else is refused
   * until the probe reports back.
   */
  tryAcquire(): boolean {
    if (this.state.state === "open") {
      const openedAt = this.state.openedAt ?? 0;
      if (this.now() - openedAt < this.options.coolDownMs) return false;
      this.state = { ...this.state, state: "half_open" };
    }
    if (this.state.state === "half_open") {
      if (this.probeInFlight) return false;
      this.probeInFlight = true;
    }
    return true;
  }

  recordSuccess(): void {
    this.probeInFlight = false;
    this.state = { state: "closed", consecutiveFailures: 0, openedAt: null };
  }

  recordFailure(): void {
    const consecutiveFailures = this.state.consecutiveFailures + 1;

    if (this.state.state === "open") {
      // a straggler from before the breaker opened; keep the original cool-down
      this.state = { ...this.state, consecutiveFailures };
      return;
    }

    if (this.state.state === "half_open" || consecutiveFailures >= this.options.failureThreshold) {
      this.probeInFlight = false;
      this.state = { state: "open", consecutiveFailures, openedAt: this.now() };
      return;
    }

    this.state = { ...this.state, consecutiveFailures };
  }

  snapshot(): CircuitState {
    return { ...this.state };
  }
}

// ── Retry + breaker wrapper ───────────────────────────────────

export class ResilienceWrapper {
  private breakers = new Map<SourceId, CircuitBreaker>();
  private health = new Map<SourceId, Omit<SourceHealth, "circuit">>();
  private random: () => number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(private options: ResilienceOptions) {
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? Date.now;
  }

  async call<T>(
    source: SourceId,
    fn: (options: FetchOptions) => Promise<T>,
  ): Promise<Result<T, FetchError>> {
    const { retry } = this.options;
    const breaker = this.breakerFor(source);
    let lastError: unknown;

    for (let attempt = 0; attempt <= retry.maxRetries; attempt++) {
      if (attempt > 0) {
        await this.sleep(backoffDelay(attempt - 1, retry, this.random));
      }

      if (!breaker.tryAcquire()) {
        const error = new FetchError("circuit_open", `Circuit open for ${source}`, source, {
          cause: lastError,
        });
        this.recordFailure(source, error);
        return { ok: false, error };
      }

      try {
        const value = await this.attempt(source, fn);
        breaker.recordSuccess();
        return { ok: true, value };
      } catch (err) {
        breaker.recordFailure();
        lastError = err;
        console.warn(
          `[resilience] ${source} attempt ${attempt + 1}/${retry.maxRetries + 1} failed: ${errorMessage(err)}`,
        );

        if (err instanceof FetchError && err.kind === "timeout") {
          this.entry(source).timeouts++;
        }
        if (err instanceof FetchError && err.kind === "invalid_response") {
          this.recordFailure(source, err);
          return { ok: false, error: err };
        }
      }
    }

    const error = new FetchError(
      "exhausted",
      `${source} failed after ${retry.maxRetries + 1} attempts: ${errorMessage(lastError)}`,
      source,
      { cause: lastError },
    );
    this.recordFailure(source, error);
    return { ok: false, error };
  }

  circuitState(source: SourceId): CircuitState {
    return this.breakerFor(source).snapshot();
  }

  healthReport(): SourceHealth[] {
    const sources = new Set([...this.breakers.keys(), ...this.health.keys()]);
    return [...sources].sort().map((source) => ({
      ...this.entry(source),
      circuit: this.circuitState(source),
    }));
  }

  // ── Internals ───────────────────────────────────────────────

  private async attempt<T>(
    source: SourceId,
    fn: (options: FetchOptions) => Promise<T>,
  ): Promise<T> {
    const { timeoutMs } = this.options.retry;
    const controller = new AbortController();
    const deadline = new Date(this.now() + timeoutMs);
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new FetchError("timeout", `${source} did not answer within ${timeoutMs}ms`, source);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([fn({ signal: controller.signal, deadline }), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private breakerFor(source: SourceId): CircuitBreaker {
    let breaker = this.breakers.get(source);
    if (!breaker) {
      breaker = new CircuitBreaker(this.options.breaker, this.now);
      this.breakers.set(source, breaker);
    }
    return breaker;
  }

  private entry(source: SourceId): Omit<SourceHealth, "circuit"> {
    let entry = this.health.get(source);
    if (!entry) {
      entry = { source, exhausted: 0, circuitOpen: 0, timeouts: 0 };
      this.health.set(source, entry);
    }
    return entry;
  }

  private recordFailure(source: SourceId, error: FetchError): void {
    const entry = this.entry(source);
    if (error.kind === "exhausted") entry.exhausted++;
    if (error.kind === "circuit_open") entry.circuitOpen++;
    entry.lastError = error.message;
    entry.lastFailureAt = new Date(this.now()).toISOString();
  }
}
