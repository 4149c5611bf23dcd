import request from "supertest";
import { afterEach, describe, expect, it } from "vitest";

import { EmbeddingsProbe } from "../health.ts";
import { EmbeddingProviderError } from "../../src/server/rag/errors.ts";
import { buildTestApp, type TestApp } from "./helpers/app.ts";
import { createFakeProvider } from "./helpers/fakes.ts";

describe("GET /health", () => {
  let t: TestApp | undefined;

  afterEach(() => {
    t?.services.close();
    t = undefined;
  });

  it("is UP when the store and the embedding provider respond", async () => {
    t = buildTestApp();
    const res = await request(t.app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: "UP",
      vectorStore: { ok: true },
      embeddings: { ok: true, provider: "fake", model: "fake-model", cached: false },
    });
  });

  it("is DOWN with a 503 when embeddings fail", async () => {
    const failing = createFakeProvider(() => {
      throw new EmbeddingProviderError("invalid api key", { retryable: false, status: 401 });
    });
    t = buildTestApp({}, failing);
    const res = await request(t.app).get("/health");

    expect(res.status).toBe(503);
    expect(res.body.status).toBe("DOWN");
    expect(res.body.vectorStore).toEqual({ ok: true });
    expect(res.body.embeddings).toMatchObject({ ok: false, error: { kind: "embedding_provider_error" } });
  });

  it("is DOWN when the store is closed", async () => {
    t = buildTestApp();
    t.services.close();
    const res = await request(t.app).get("/health");

    expect(res.status).toBe(503);
    expect(res.body.vectorStore).toMatchObject({ ok: false, error: { kind: "vector_store_unavailable" } });
  });
});

describe("EmbeddingsProbe", () => {
  it("caches the result for the TTL and shares one in-flight probe", async () => {
    let calls = 0;
    let now = 1_000;
    const probe = new EmbeddingsProbe(
      async () => {
        calls += 1;
        return [0.1, 0.2];
      },
      { ttlMs: 100, now: () => now },
    );

    const [a, b] = await Promise.all([probe.check(), probe.check()]);
    expect(a).toEqual({ value: { ok: true }, cached: false });
    expect(b).toEqual({ value: { ok: true }, cached: false });
    expect(calls).toBe(1);

    now += 50;
    expect(await probe.check()).toEqual({ value: { ok: true }, cached: true });

    now += 100;
    await probe.check();
    expect(calls).toBe(2);
  });

  it("fails on an invalid vector", async () => {
    const probe = new EmbeddingsProbe(async () => [Number.NaN], { ttlMs: 0 });
    expect((await probe.check()).value).toEqual({
      ok: false,
      error: { kind: "embedding_provider_error", message: "Embeddings returned an invalid vector" },
    });
  });
});
