import { isRetryable } from "./errors.ts";

export interface RetryOptions {
  attempts: number;
  baseMs: number;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function abortError(message = "Operation cancelled"): Error {
  const err = new Error(message);
  err.name = "AbortError";
  return err;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) { throw abortError(); }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `fn` up to `attempts` times. Only errors flagged retryable are retried;
 * the delay before attempt n+1 is `baseMs * 2^(n-1)`.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, Math.floor(opts.attempts));
  const baseMs = Math.max(0, opts.baseMs);

  let attempt = 1;
  for (;;) {
    throwIfAborted(opts.signal);
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      if (attempt >= attempts || !isRetryable(error)) { throw error; }

      const delayMs = baseMs * 2 ** (attempt - 1);
      opts.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs, opts.signal);
      attempt += 1;
    }
  }
}
