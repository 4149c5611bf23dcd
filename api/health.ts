import type express from "express";

import { toErrorPayload, type RagErrorPayload } from "../src/server/rag/errors.ts";
import { createLogger } from "../src/server/logging.ts";
import type { RagServices } from "./services.ts";

type ProbeResult = { ok: true } | { ok: false; error: RagErrorPayload };

export interface HealthResponse {
  status: "UP" | "DOWN";
  vectorStore: ProbeResult;
  embeddings: ProbeResult & { provider: string; model: string; cached: boolean };
}

interface CachedProbe {
  atMs: number;
  value: ProbeResult;
}

const log = createLogger("api.health");

/**
 * Embedding probes cost a provider round trip, so the last result is kept for
 * `ttlMs` and concurrent health checks share one in-flight probe.
 */
export class EmbeddingsProbe {
  private cached: CachedProbe | null = null;
  private inflight: Promise<ProbeResult> | null = null;
  private readonly embedQuery: (text: string) => Promise<number[]>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(embedQuery: (text: string) => Promise<number[]>, opts: { ttlMs: number; now?: () => number }) {
    this.embedQuery = embedQuery;
    this.ttlMs = opts.ttlMs;
    this.now = opts.now ?? Date.now;
  }

  async check(): Promise<{ value: ProbeResult; cached: boolean }> {
    if (this.cached && this.now() - this.cached.atMs < this.ttlMs) {
      return { value: this.cached.value, cached: true };
    }
    if (!this.inflight) {
      this.inflight = this.probe();
    }
    try {
      const value = await this.inflight;
      this.cached = { atMs: this.now(), value };
      return { value, cached: false };
    } finally {
      this.inflight = null;
    }
  }

  private async probe(): Promise<ProbeResult> {
    try {
      const vec = await this.embedQuery("ping");
      if (!vec.length || !vec.every((n) => Number.isFinite(n))) {
        return { ok: false, error: { kind: "embedding_provider_error", message: "Embeddings returned an invalid vector" } };
      }
      return { ok: true };
    } catch (error: unknown) {
      return { ok: false, error: toErrorPayload(error) };
    }
  }
}

async function probeStore(ping: () => Promise<void>): Promise<ProbeResult> {
  try {
    await ping();
    return { ok: true };
  } catch (error: unknown) {
    return { ok: false, error: toErrorPayload(error) };
  }
}

export function createHealthHandler(services: RagServices): express.RequestHandler {
  const { store, embeddings } = services;
  const probe = new EmbeddingsProbe((text) => embeddings.embedQuery(text), {
    ttlMs: services.config.health.embeddingsProbeTtlMs,
  });

  return async (_req, res) => {
    const vectorStore = await probeStore(() => store.ping());
    const embedded = await probe.check();
    const up = vectorStore.ok && embedded.value.ok;

    if (!up) {
      log.warn("health check failed", {
        vectorStore: vectorStore.ok ? "ok" : vectorStore.error.kind,
        embeddings: embedded.value.ok ? "ok" : embedded.value.error.kind,
      });
    }

    const out: HealthResponse = {
      status: up ? "UP" : "DOWN",
      vectorStore,
      embeddings: {
        ...embedded.value,
        provider: embeddings.provider.name,
        model: embeddings.provider.model,
        cached: embedded.cached,
      },
    };
    return res.status(up ? 200 : 503).json(out);
  };
}
