import { EmbeddingProviderError } from "../errors.ts";
import { createLimiter, type Limiter } from "../concurrency.ts";
import { withRetry, throwIfAborted } from "../retry.ts";
import { createLogger } from "../../logging.ts";
import type { EmbedPurpose, EmbeddingProvider } from "./types.ts";

export interface EmbeddingGatewayOptions {
  batchSize: number;
  maxConcurrency: number;
  retry: { attempts: number; baseMs: number };
}

const log = createLogger("rag.embeddings");

/**
 * Splits input into provider-sized batches, runs at most `maxConcurrency` of
 * them at a time and reassembles the vectors in input order. Retryable provider
 * errors are retried per batch; a batch that still fails fails the whole call
 * and aborts the batches that have not finished yet.
 */
export class EmbeddingGateway {
  readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private readonly retry: { attempts: number; baseMs: number };
  private readonly limiter: Limiter;

  constructor(provider: EmbeddingProvider, opts: EmbeddingGatewayOptions) {
    this.provider = provider;
    this.batchSize = Math.max(1, Math.floor(opts.batchSize));
    this.retry = opts.retry;
    this.limiter = createLimiter(opts.maxConcurrency);
  }

  async embed(texts: string[], signal?: AbortSignal, purpose: EmbedPurpose = "document"): Promise<number[][]> {
    if (texts.length === 0) { return []; }

    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      batches.push(texts.slice(i, i + this.batchSize));
    }

    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort();
    if (signal?.aborted) { controller.abort(); }
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const results = await Promise.all(
      batches.map((batch, batchIndex) =>
        this.limiter.run(() => this.embedBatch(batch, batchIndex, controller.signal, purpose)).catch((error: unknown) => {
          controller.abort();
          throw error;
        }),
      ),
    ).finally(() => {
      signal?.removeEventListener("abort", onCallerAbort);
    });

    const vectors = results.flat();
    const dim = vectors[0]?.length ?? 0;
    if (vectors.length !== texts.length || vectors.some((v) => v.length !== dim)) {
      throw new EmbeddingProviderError(
        `${this.provider.name} returned ${vectors.length} vectors of mixed dimension for ${texts.length} texts`,
      );
    }
    return vectors;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const [vector] = await this.embed([text], signal, "query");
    if (!vector) {
      throw new EmbeddingProviderError(`${this.provider.name} returned no vector for the query`);
    }
    return vector;
  }

  private async embedBatch(batch: string[], batchIndex: number, signal: AbortSignal, purpose: EmbedPurpose): Promise<number[][]> {
    throwIfAborted(signal);
    return withRetry(() => this.provider.embed(batch, signal, purpose), {
      ...this.retry,
      signal,
      onRetry: ({ attempt, delayMs, error }) => {
        log.warn("embedding batch failed; retrying", {
          provider: this.provider.name,
          batchIndex,
          attempt,
          delayMs,
          reason: error instanceof Error ? error.message : String(error),
        });
      },
    });
  }
}
