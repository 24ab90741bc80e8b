export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error('Operation aborted');
}

export function randomBetween(min: number, max: number): number {
  if (max <= min) return min;
  return min + Math.random() * (max - min);
}

export function backoffDelay(attempt: number, baseMs: number, maxMs = Number.POSITIVE_INFINITY) {
  return Math.min(baseMs * 2 ** (attempt - 1), maxMs);
}

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (err: Error) => boolean;
  onRetry?: (err: Error, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/** Retries with exponential backoff; the last error is rethrown. */
export async function retryAsync<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  let lastError: Error | undefined;
  for (let i = 1; i <= opts.attempts; i++) {
    try {
      return await fn(i);
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      const retryable = opts.shouldRetry ? opts.shouldRetry(lastError) : true;
      if (!retryable || i === opts.attempts) break;
      const delay = backoffDelay(i, opts.baseDelayMs, opts.maxDelayMs);
      opts.onRetry?.(lastError, i, delay);
      await sleep(delay, opts.signal);
    }
  }
  throw lastError ?? new Error('retryAsync called with zero attempts');
}

export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function safeJsonParse<T>(raw: string, fallback: T): T {
  try {
    return JSON.parse(raw) as T;
  } catch {
    return fallback;
  }
}

export function maskValue(value: string, visible = 4): string {
  if (value.length <= visible) return '*'.repeat(value.length);
  return `${'*'.repeat(value.length - visible)}${value.slice(-visible)}`;
}
