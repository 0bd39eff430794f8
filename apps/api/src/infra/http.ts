import type { Logger } from "../types/index.js";

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function shouldRetryStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

// --- Circuit Breaker ---
type CircuitState = "closed" | "open" | "half-open";

export interface CircuitBreakerState {
  name: string;
  state: CircuitState;
  failures: number;
  lastFailureAt: number;
}

export interface CircuitBreaker {
  recordSuccess(): void;
  recordFailure(): void;
  releaseProbe(): void;
  canRequest(): boolean;
  getState(): CircuitBreakerState;
}

interface CircuitBreakerOptions {
  failureThreshold?: number;
  resetTimeoutMs?: number;
  logger?: Logger | Console;
}

/**
 * Consecutive-failure breaker for one upstream host. After `resetTimeoutMs` in
 * the open state a single probe is let through; its outcome closes or re-opens
 * the circuit. A probe that ends without an outcome (the caller aborted) is
 * released so the next request can probe again.
 */
export function createCircuitBreaker(name: string, opts: CircuitBreakerOptions = {}): CircuitBreaker {
  const { failureThreshold = 5, resetTimeoutMs = 30_000, logger = console } = opts;
  const snapshot: CircuitBreakerState = { name, state: "closed", failures: 0, lastFailureAt: 0 };
  let probing = false;

  function transition(next: CircuitState, msg: string) {
    if (snapshot.state === next) return;
    snapshot.state = next;
    logger.warn({ circuit: name, state: next, failures: snapshot.failures }, msg);
  }

  return {
    recordSuccess() {
      probing = false;
      snapshot.failures = 0;
      transition("closed", "upstream circuit closed");
    },
    recordFailure() {
      probing = false;
      snapshot.failures++;
      snapshot.lastFailureAt = Date.now();
      if (snapshot.state === "half-open") {
        transition("open", "upstream circuit re-opened after failed probe");
      } else if (snapshot.failures >= failureThreshold) {
        transition("open", "upstream circuit opened");
      }
    },
    releaseProbe() {
      probing = false;
      if (snapshot.state === "half-open") snapshot.state = "open";
    },
    canRequest() {
      switch (snapshot.state) {
        case "closed":
          return true;
        case "open":
          if (Date.now() - snapshot.lastFailureAt < resetTimeoutMs) return false;
          snapshot.state = "half-open";
          probing = true;
          return true;
        case "half-open":
          return !probing;
      }
    },
    getState() {
      return { ...snapshot };
    },
  };
}

const circuitBreakers = new Map<string, CircuitBreaker>();

function getCircuitBreaker(url: string, logger: Logger | Console): CircuitBreaker | null {
  let host: string;
  try {
    host = new URL(url).host;
  } catch {
    return null;
  }
  let breaker = circuitBreakers.get(host);
  if (!breaker) {
    breaker = createCircuitBreaker(host, { logger });
    circuitBreakers.set(host, breaker);
  }
  return breaker;
}

export class CircuitOpenError extends Error {
  code = "CIRCUIT_OPEN";

  constructor(host: string) {
    super(`Circuit breaker open for ${host}`);
    this.name = "CircuitOpenError";
  }
}

export interface FetchWithRetryOptions extends RequestInit {
  retries?: number;
  timeoutMs?: number;
  backoffMs?: number;
  logger?: Logger | Console;
}

/**
 * fetch with per-attempt timeout, linear backoff and a per-host circuit breaker.
 * An abort of the caller's `signal` ends the call at once, without retrying and
 * without counting against the breaker.
 */
export async function fetchWithRetry(url: string, options: FetchWithRetryOptions = {}): Promise<Response> {
  const {
    retries = 2,
    timeoutMs = 15_000,
    backoffMs = 500,
    logger = console,
    signal: callerSignal,
    ...fetchOptions
  } = options;
  const outer = callerSignal ?? undefined;

  outer?.throwIfAborted();

  const breaker = getCircuitBreaker(url, logger);
  if (breaker && !breaker.canRequest()) {
    throw new CircuitOpenError(new URL(url).host);
  }

  let lastError: unknown = null;
  try {
    for (let attempt = 0; attempt <= retries; attempt++) {
      const ctrl = new AbortController();
      const timer = setTimeout(() => ctrl.abort(new Error("fetch timeout")), timeoutMs);
      const forwardAbort = () => ctrl.abort(outer?.reason);
      outer?.addEventListener("abort", forwardAbort, { once: true });

      try {
        const response = await fetch(url, {
          ...fetchOptions,
          signal: ctrl.signal,
        });

        if (attempt < retries && shouldRetryStatus(response.status)) {
          let waitMs = backoffMs * (attempt + 1);
          if (response.status === 429) {
            const retryAfter = response.headers.get("retry-after");
            if (retryAfter) {
              const parsed = Number(retryAfter);
              waitMs = Number.isFinite(parsed)
                ? parsed * 1000
                : Math.max(0, new Date(retryAfter).getTime() - Date.now());
              waitMs = Math.min(Math.max(waitMs, 1000), 120_000);
            }
          }
          logger.warn({ url, status: response.status, attempt, retries, waitMs }, "retrying fetch due to response status");
          if (breaker) breaker.recordFailure();
          await sleep(waitMs, outer);
          continue;
        }

        if (breaker) {
          if (response.ok || !shouldRetryStatus(response.status)) {
            breaker.recordSuccess();
          } else {
            breaker.recordFailure();
          }
        }

        return response;
      } catch (error) {
        if (outer?.aborted) throw outer.reason;
        lastError = error;
        if (breaker) breaker.recordFailure();

        if (attempt >= retries) break;
        logger.warn({ url, attempt, retries, err: error instanceof Error ? error.message : String(error) }, "retrying fetch after error");
        await sleep(backoffMs * (attempt + 1), outer);
      } finally {
        clearTimeout(timer);
        outer?.removeEventListener("abort", forwardAbort);
      }
    }
  } catch (error) {
    // aborted by the caller, possibly mid-backoff: no outcome for the breaker
    if (outer?.aborted) {
      breaker?.releaseProbe();
      throw outer.reason;
    }
    throw error;
  }

  throw lastError ?? new Error("fetchWithRetry failed");
}

export function getCircuitBreakerStates(): CircuitBreakerState[] {
  const result: CircuitBreakerState[] = [];
  for (const [, breaker] of circuitBreakers) {
    result.push(breaker.getState());
  }
  return result;
}

export function resetCircuitBreakers(): void {
  circuitBreakers.clear();
}
