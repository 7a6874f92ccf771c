// lib/externalCallGuard.ts
export type RetryOptions = {
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY: RetryOptions = { retries: 1, baseDelayMs: 500, maxDelayMs: 4000 };

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(message = "Timed out", timeoutMs = 0) {
    super(message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label = "operation"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`, ms)), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number) {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function computeDelay(attempt: number, baseDelayMs: number, maxDelayMs: number) {
  const exp = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
  const jitter = Math.floor(Math.random() * 250);
  return exp + jitter;
}

export async function withRetries<T>(
  fn: () => Promise<T>,
  opts: RetryOptions,
  isRetryable: (err: unknown) => boolean
): Promise<T> {
  let lastErr: unknown;
  for (let attempt = 1; attempt <= 1 + opts.retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastErr = err;
      if (attempt >= 1 + opts.retries || !isRetryable(err)) {
        break;
      }
      await sleep(computeDelay(attempt, opts.baseDelayMs, opts.maxDelayMs));
    }
  }
  throw lastErr;
}

type BreakerState = {
  failures: number;
  openedUntil: number;
};

const breakerMap = new Map<string, BreakerState>();

export type CircuitBreakerOptions = {
  failureThreshold: number;
  cooldownMs: number;
};

export const DEFAULT_BREAKER: CircuitBreakerOptions = { failureThreshold: 3, cooldownMs: 30_000 };

export class CircuitOpenError extends Error {
  readonly breakerKey: string;

  constructor(label: string, breakerKey: string) {
    super(`${label} blocked: circuit breaker open`);
    this.name = "CircuitOpenError";
    this.breakerKey = breakerKey;
  }
}

export function isBreakerOpen(key: string) {
  const st = breakerMap.get(key);
  if (!st) return false;
  if (st.openedUntil === 0) return false;
  if (Date.now() >= st.openedUntil) {
    breakerMap.set(key, { failures: 0, openedUntil: 0 });
    return false;
  }
  return true;
}

export function resetBreakers() {
  breakerMap.clear();
}

function recordFailure(key: string, opts: CircuitBreakerOptions) {
  const st = breakerMap.get(key) ?? { failures: 0, openedUntil: 0 };
  const failures = st.failures + 1;

  if (failures >= opts.failureThreshold) {
    breakerMap.set(key, { failures, openedUntil: Date.now() + opts.cooldownMs });
  } else {
    breakerMap.set(key, { failures, openedUntil: 0 });
  }
}

function recordSuccess(key: string) {
  breakerMap.set(key, { failures: 0, openedUntil: 0 });
}

/**
 * Breaker, retries and a per-attempt timeout around one outbound call.
 * Breaker state is per process and keyed by upstream, so concurrent
 * consultations share it.
 */
export async function guardedExternalCall<T>(params: {
  breakerKey: string;
  breaker: CircuitBreakerOptions;
  timeoutMs: number;
  retry: RetryOptions;
  label: string;
  fn: () => Promise<T>;
  isRetryable: (err: unknown) => boolean;
}): Promise<T> {
  const { breakerKey, breaker, timeoutMs, retry, label, fn, isRetryable } = params;

  if (isBreakerOpen(breakerKey)) {
    throw new CircuitOpenError(label, breakerKey);
  }

  try {
    const result = await withRetries(
      () => withTimeout(fn(), timeoutMs, label),
      retry,
      isRetryable
    );
    recordSuccess(breakerKey);
    return result;
  } catch (err) {
    recordFailure(breakerKey, breaker);
    throw err;
  }
}
