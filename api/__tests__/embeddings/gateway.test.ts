import { describe, expect, it } from "vitest";

import { EmbeddingGateway } from "../../../src/server/rag/embeddings/gateway.ts";
import type { EmbedPurpose, EmbeddingProvider } from "../../../src/server/rag/embeddings/types.ts";
import { EmbeddingProviderError } from "../../../src/server/rag/errors.ts";
import { createFakeProvider, FAST_RETRY } from "../helpers/fakes.ts";

function lengthVector(text: string): number[] {
  return [text.length, 1];
}

describe("EmbeddingGateway", () => {
  it("splits input into batches and keeps input order", async () => {
    const provider = createFakeProvider(lengthVector);
    const gateway = new EmbeddingGateway(provider, { batchSize: 2, maxConcurrency: 2, retry: FAST_RETRY });

    const vectors = await gateway.embed(["a", "bb", "ccc", "dddd", "eeeee"]);

    expect(provider.calls).toEqual([["a", "bb"], ["ccc", "dddd"], ["eeeee"]]);
    expect(vectors).toEqual([[1, 1], [2, 1], [3, 1], [4, 1], [5, 1]]);
  });

  it("returns [] without calling the provider for empty input", async () => {
    const provider = createFakeProvider();
    const gateway = new EmbeddingGateway(provider, { batchSize: 2, maxConcurrency: 1, retry: FAST_RETRY });
    expect(await gateway.embed([])).toEqual([]);
    expect(provider.calls).toEqual([]);
  });

  it("runs at most maxConcurrency batches at once", async () => {
    let active = 0;
    let peak = 0;
    const provider: EmbeddingProvider = {
      name: "slow",
      model: "slow",
      async embed(texts) {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((r) => setTimeout(r, 5));
        active -= 1;
        return texts.map(lengthVector);
      },
    };
    const gateway = new EmbeddingGateway(provider, { batchSize: 1, maxConcurrency: 2, retry: FAST_RETRY });

    const vectors = await gateway.embed(["a", "b", "c", "d", "e", "f"]);
    expect(vectors).toHaveLength(6);
    expect(peak).toBe(2);
  });

  it("retries a batch after a retryable provider error", async () => {
    let calls = 0;
    const provider: EmbeddingProvider = {
      name: "flaky",
      model: "flaky",
      async embed(texts) {
        calls += 1;
        if (calls === 1) { throw new EmbeddingProviderError("HTTP 503", { retryable: true, status: 503 }); }
        return texts.map(lengthVector);
      },
    };
    const gateway = new EmbeddingGateway(provider, { batchSize: 10, maxConcurrency: 1, retry: FAST_RETRY });

    expect(await gateway.embedQuery("abc")).toEqual([3, 1]);
    expect(calls).toBe(2);
  });

  it("does not retry a fatal provider error", async () => {
    let calls = 0;
    const provider: EmbeddingProvider = {
      name: "denied",
      model: "denied",
      async embed() {
        calls += 1;
        throw new EmbeddingProviderError("HTTP 401", { retryable: false, status: 401 });
      },
    };
    const gateway = new EmbeddingGateway(provider, { batchSize: 10, maxConcurrency: 1, retry: FAST_RETRY });

    await expect(gateway.embed(["x"])).rejects.toMatchObject({ kind: "embedding_provider_error", status: 401 });
    expect(calls).toBe(1);
  });

  it("rejects vectors of mixed dimension across batches", async () => {
    const provider = createFakeProvider((t) => (t === "odd" ? [1, 2, 3] : [1, 2]));
    const gateway = new EmbeddingGateway(provider, { batchSize: 1, maxConcurrency: 1, retry: FAST_RETRY });

    await expect(gateway.embed(["even", "odd"])).rejects.toBeInstanceOf(EmbeddingProviderError);
  });

  it("stops before calling the provider when already cancelled", async () => {
    const provider = createFakeProvider();
    const gateway = new EmbeddingGateway(provider, { batchSize: 1, maxConcurrency: 1, retry: FAST_RETRY });
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.embed(["x"], controller.signal)).rejects.toMatchObject({ name: "AbortError" });
    expect(provider.calls).toEqual([]);
  });

  it("leaves queued batches alone once one batch fails for good", async () => {
    const seen: string[][] = [];
    const provider: EmbeddingProvider = {
      name: "quota",
      model: "quota",
      async embed(texts) {
        seen.push([...texts]);
        throw new EmbeddingProviderError("quota exhausted", { retryable: false, status: 429 });
      },
    };
    const gateway = new EmbeddingGateway(provider, { batchSize: 1, maxConcurrency: 1, retry: FAST_RETRY });

    await expect(gateway.embed(["a", "b", "c"])).rejects.toMatchObject({ message: "quota exhausted" });
    expect(seen).toEqual([["a"]]);
  });

  it("tells the provider whether it is embedding documents or a query", async () => {
    const purposes: Array<EmbedPurpose | undefined> = [];
    const provider: EmbeddingProvider = {
      name: "purposeful",
      model: "purposeful",
      async embed(texts, _signal, purpose) {
        purposes.push(purpose);
        return texts.map(lengthVector);
      },
    };
    const gateway = new EmbeddingGateway(provider, { batchSize: 10, maxConcurrency: 1, retry: FAST_RETRY });

    await gateway.embed(["chunk one", "chunk two"]);
    await gateway.embedQuery("what is in chunk one?");

    expect(purposes).toEqual(["document", "query"]);
  });
});
