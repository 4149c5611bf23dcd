import { afterEach, describe, expect, it, vi } from "vitest";

import { postJson } from "../../../src/server/rag/embeddings/http.ts";
import { createHuggingFaceEmbeddings, createHuggingFaceTeiEmbeddings } from "../../../src/server/rag/embeddings/huggingface.ts";
import { createEmbeddingProvider } from "../../../src/server/rag/embeddings/index.ts";
import { createOllamaEmbeddings } from "../../../src/server/rag/embeddings/ollama.ts";
import { createVertexAiEmbeddings } from "../../../src/server/rag/embeddings/vertexai.ts";
import { EmbeddingProviderError } from "../../../src/server/rag/errors.ts";
import { testConfig } from "../helpers/fakes.ts";
import { jsonResponse, mockFetch, requestOf } from "../helpers/fetch.ts";

describe("ollama embeddings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("posts the batch to /api/embed and returns the vectors", async () => {
    const fetchMock = mockFetch(async () => jsonResponse({ embeddings: [[1, 0], [0, 1]] }));

    const provider = createOllamaEmbeddings({ baseUrl: "http://ollama.test:11434/", model: "nomic-embed-text", timeoutMs: 1000 });
    const out = await provider.embed(["hello", "world"]);

    expect(out).toEqual([[1, 0], [0, 1]]);
    const { url, body } = requestOf(fetchMock);
    expect(url).toBe("http://ollama.test:11434/api/embed");
    expect(body).toEqual({ model: "nomic-embed-text", input: ["hello", "world"] });
  });

  it("fails when the response has no embeddings array", async () => {
    mockFetch(async () => jsonResponse({ error: "model not found" }));

    const provider = createOllamaEmbeddings({ baseUrl: "http://ollama.test:11434", model: "missing", timeoutMs: 1000 });
    await expect(provider.embed(["x"])).rejects.toThrow('did not return an embeddings array for model "missing"');
  });

  it("fails when the vector count does not match the input", async () => {
    mockFetch(async () => jsonResponse({ embeddings: [[1, 0]] }));

    const provider = createOllamaEmbeddings({ baseUrl: "http://ollama.test:11434", model: "m", timeoutMs: 1000 });
    await expect(provider.embed(["a", "b"])).rejects.toThrow("ollama embeddings count mismatch: expected 2, got 1");
  });
});

describe("postJson", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("marks 5xx and 429 retryable and 4xx fatal", async () => {
    mockFetch(async () => jsonResponse({ error: "busy" }, 503));
    await expect(postJson("http://x.test/e", {}, { provider: "p", timeoutMs: 1000 })).rejects.toMatchObject({
      status: 503,
      retryable: true,
    });

    mockFetch(async () => jsonResponse({ error: "slow down" }, 429));
    await expect(postJson("http://x.test/e", {}, { provider: "p", timeoutMs: 1000 })).rejects.toMatchObject({
      status: 429,
      retryable: true,
    });

    mockFetch(async () => jsonResponse({ error: "bad key" }, 401));
    await expect(postJson("http://x.test/e", {}, { provider: "p", timeoutMs: 1000 })).rejects.toMatchObject({
      status: 401,
      retryable: false,
    });
  });

  it("turns a timeout into a retryable provider error", async () => {
    mockFetch(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const err = new Error("aborted");
            err.name = "AbortError";
            reject(err);
          });
        }),
    );

    const err = await postJson("http://x.test/e", {}, { provider: "p", timeoutMs: 10 }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EmbeddingProviderError);
    expect(err).toMatchObject({ retryable: true, message: "p embeddings request timed out after 10ms" });
  });

  it("turns a network failure into a retryable provider error", async () => {
    mockFetch(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(postJson("http://x.test/e", {}, { provider: "p", timeoutMs: 1000 })).rejects.toMatchObject({
      retryable: true,
      message: "p embeddings request failed: fetch failed",
    });
  });
});

describe("huggingface embeddings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the token and model to the inference API", async () => {
    const fetchMock = mockFetch(async () => jsonResponse([[0.5, 0.5]]));

    const provider = createHuggingFaceEmbeddings({
      model: "sentence-transformers/all-MiniLM-L6-v2",
      token: "test-secret",
      timeoutMs: 1000,
      baseUrl: "http://hf.test/pipeline/feature-extraction",
    });
    expect(await provider.embed(["q"])).toEqual([[0.5, 0.5]]);

    const { url, body, headers } = requestOf(fetchMock);
    expect(url).toBe("http://hf.test/pipeline/feature-extraction/sentence-transformers/all-MiniLM-L6-v2");
    expect(headers).toMatchObject({ Authorization: "Bearer test-secret" });
    expect(body).toEqual({ inputs: ["q"], options: { wait_for_model: true } });
  });

  it("requires a token", () => {
    expect(() => createHuggingFaceEmbeddings({ model: "m", timeoutMs: 1000 })).toThrow("HF_TOKEN is required");
  });

  it("talks to a TEI server at the configured base URL", async () => {
    const fetchMock = mockFetch(async () => jsonResponse([[1, 2, 3]]));

    const provider = createHuggingFaceTeiEmbeddings({ baseUrl: "http://tei.test:3000/", timeoutMs: 1000 });
    expect(await provider.embed(["x"])).toEqual([[1, 2, 3]]);

    const { url, body } = requestOf(fetchMock);
    expect(url).toBe("http://tei.test:3000/embed");
    expect(body).toEqual({ inputs: ["x"], truncate: true });
  });
});

describe("vertexai embeddings", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("embeds documents and queries with their own task types", async () => {
    const fetchMock = mockFetch(async () => jsonResponse({ embeddings: [{ values: [0.5, 0.5] }] }));
    const provider = createVertexAiEmbeddings({
      model: "text-embedding-004",
      timeoutMs: 1000,
      vertexai: { apiKey: "test-secret" },
    });

    expect(await provider.embed(["a chunk"])).toEqual([[0.5, 0.5]]);
    expect(await provider.embed(["a question"], undefined, "query")).toEqual([[0.5, 0.5]]);

    expect(requestOf(fetchMock, 0).body).toMatchObject({ requests: [{ taskType: "RETRIEVAL_DOCUMENT" }] });
    expect(requestOf(fetchMock, 1).body).toMatchObject({ requests: [{ taskType: "RETRIEVAL_QUERY" }] });
  });
});

describe("createEmbeddingProvider", () => {
  it("builds the configured provider with its default model", () => {
    const ollama = createEmbeddingProvider(testConfig({ EMBEDDINGS_PROVIDER: "ollama" }).embeddings);
    expect([ollama.name, ollama.model]).toEqual(["ollama", "nomic-embed-text"]);

    const tei = createEmbeddingProvider(testConfig({ EMBEDDINGS_PROVIDER: "huggingfacetei" }).embeddings);
    expect([tei.name, tei.model]).toEqual(["huggingfacetei", "http://huggingfacetei:3000"]);
  });

  it("fails fast when a hosted provider has no credentials", () => {
    expect(() => createEmbeddingProvider(testConfig({ EMBEDDINGS_PROVIDER: "openai" }).embeddings)).toThrow(
      EmbeddingProviderError,
    );
    expect(() => createEmbeddingProvider(testConfig({ EMBEDDINGS_PROVIDER: "vertexai" }).embeddings)).toThrow(
      "GOOGLE_API_KEY is required",
    );
  });

  it("creates an OpenAI client when a key is present", () => {
    const provider = createEmbeddingProvider(
      testConfig({ EMBEDDINGS_PROVIDER: "openai", RAG_OPENAI_API_KEY: "test-secret" }).embeddings,
    );
    expect([provider.name, provider.model]).toEqual(["openai", "text-embedding-3-small"]);
  });
});
