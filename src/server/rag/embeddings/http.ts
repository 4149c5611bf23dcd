import { EmbeddingProviderError, toOneLine } from "../errors.ts";
import { isAbortError } from "../retry.ts";
import { isFiniteVector } from "../query/similarity.ts";

export function sanitizeBaseUrl(url: string): string {
  return String(url || "").trim().replace(/\/+$/, "");
}

function describeResponseBody(body: unknown): string {
  try {
    return toOneLine(JSON.stringify(body)).slice(0, 500);
  } catch {
    return "";
  }
}

/** 408, 429 and 5xx are worth another try; other statuses mean bad input, auth or quota. */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export interface PostJsonOptions {
  provider: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

/**
 * POSTs JSON and returns the parsed body. Timeouts, network failures and
 * retryable statuses surface as retryable EmbeddingProviderErrors.
 */
export async function postJson(url: string, body: unknown, opts: PostJsonOptions): Promise<unknown> {
  const abortController = new AbortController();
  const timeout = setTimeout(() => abortController.abort(), opts.timeoutMs);
  const onCallerAbort = (): void => abortController.abort();
  opts.signal?.addEventListener("abort", onCallerAbort, { once: true });

  try {
    const resp = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...(opts.headers ?? {}) },
      body: JSON.stringify(body),
      signal: abortController.signal,
    });

    const json: unknown = await resp.json().catch(() => null);

    if (!resp.ok) {
      const suffix = json ? ` body=${describeResponseBody(json)}` : "";
      throw new EmbeddingProviderError(`${opts.provider} embeddings request failed (HTTP ${resp.status}).${suffix}`, {
        status: resp.status,
        retryable: isRetryableStatus(resp.status),
      });
    }

    return json;
  } catch (error: unknown) {
    if (error instanceof EmbeddingProviderError) { throw error; }
    if (opts.signal?.aborted) { throw error; }
    if (abortController.signal.aborted || isAbortError(error)) {
      throw new EmbeddingProviderError(`${opts.provider} embeddings request timed out after ${opts.timeoutMs}ms`, {
        retryable: true,
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error ?? "unknown error");
    throw new EmbeddingProviderError(`${opts.provider} embeddings request failed: ${message}`, {
      retryable: true,
      cause: error,
    });
  } finally {
    clearTimeout(timeout);
    opts.signal?.removeEventListener("abort", onCallerAbort);
  }
}

/** Checks a decoded response is `expected` finite vectors of one shared dimension. */
export function assertVectors(value: unknown, expected: number, provider: string): number[][] {
  if (!Array.isArray(value)) {
    throw new EmbeddingProviderError(`${provider} embeddings response did not contain a vector list`);
  }
  if (value.length !== expected) {
    throw new EmbeddingProviderError(`${provider} embeddings count mismatch: expected ${expected}, got ${value.length}`);
  }

  const vectors: number[][] = [];
  let dim = -1;
  value.forEach((vec: unknown, i: number) => {
    if (!isFiniteVector(vec)) {
      throw new EmbeddingProviderError(`${provider} embeddings returned an empty or non-numeric vector at index ${i}`);
    }
    if (dim === -1) { dim = vec.length; }
    if (vec.length !== dim) {
      throw new EmbeddingProviderError(
        `${provider} embeddings returned inconsistent dimensions (got ${vec.length} vs ${dim})`,
      );
    }
    vectors.push(vec);
  });

  return vectors;
}
