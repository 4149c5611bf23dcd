import os from "node:os";
import path from "node:path";
import fsp from "node:fs/promises";

import { loadConfig, type AppConfig } from "../../config.ts";
import { openDb, MEMORY_DB } from "../../../src/server/db/index.ts";
import { EmbeddingGateway } from "../../../src/server/rag/embeddings/gateway.ts";
import type { EmbeddingProvider } from "../../../src/server/rag/embeddings/types.ts";
import { SqliteVectorStore } from "../../../src/server/rag/vectorStore/sqlite.ts";
import type { ChunkRecord, VectorStoreGateway } from "../../../src/server/rag/vectorStore/types.ts";

export const NO_RETRY = { attempts: 1, baseMs: 0 };
export const FAST_RETRY = { attempts: 3, baseMs: 0 };

/** Words the fake embedding model knows; anything else only touches the last dimension. */
export const VOCAB = ["apple", "banana", "cherry", "invoice", "contract", "revenue", "holiday", "policy"] as const;

export const DIM = VOCAB.length + 1;

/** Keyword-count vector: texts sharing vocabulary words point the same way. */
export function keywordVector(text: string): number[] {
  const v = new Array<number>(DIM).fill(0);
  const words = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
  for (const w of words) {
    const i = VOCAB.findIndex((k) => k === w);
    if (i >= 0) { v[i] = (v[i] ?? 0) + 1; }
  }
  // Never all-zero, so every text has a defined cosine.
  v[DIM - 1] = 0.01;
  return v;
}

export interface FakeProvider extends EmbeddingProvider {
  calls: string[][];
}

export function createFakeProvider(
  embedOne: (text: string) => number[] = keywordVector,
): FakeProvider {
  const calls: string[][] = [];
  return {
    name: "fake",
    model: "fake-model",
    calls,
    async embed(texts) {
      calls.push([...texts]);
      return texts.map(embedOne);
    },
  };
}

export function createGateway(provider: EmbeddingProvider = createFakeProvider(), batchSize = 8): EmbeddingGateway {
  return new EmbeddingGateway(provider, { batchSize, maxConcurrency: 2, retry: FAST_RETRY });
}

export function memoryStore(): SqliteVectorStore {
  return new SqliteVectorStore(openDb(MEMORY_DB));
}

export function record(fileId: string, chunkIndex: number, text: string, embedding = keywordVector(text)): ChunkRecord {
  return { fileId, chunkIndex, text, embedding, metadata: { filename: `${fileId}.txt`, page: chunkIndex + 1 } };
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: "test",
    RAG_DB_PATH: MEMORY_DB,
    EMBEDDINGS_PROVIDER: "ollama",
    RAG_RETRY_BASE_MS: "0",
    HEALTH_EMBEDDINGS_TTL_MS: "0",
    CHUNK_SIZE: "40",
    CHUNK_OVERLAP: "5",
    ...env,
  });
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function rmDirSafe(dir: string | undefined): Promise<void> {
  if (!dir) { return; }
  await fsp.rm(dir, { recursive: true, force: true });
}

type Method = "upsert" | "similaritySearch" | "deleteByFileId" | "fetchChunks" | "stats" | "count";

/**
 * Delegates to a real store and throws `error` from the named method for the
 * next `times` calls.
 */
export class FlakyStore implements VectorStoreGateway {
  readonly inner: VectorStoreGateway;
  readonly calls: Record<Method, number> = {
    upsert: 0,
    similaritySearch: 0,
    deleteByFileId: 0,
    fetchChunks: 0,
    stats: 0,
    count: 0,
  };
  private readonly failures = new Map<Method, { error: Error; times: number }>();

  constructor(inner: VectorStoreGateway) {
    this.inner = inner;
  }

  failNext(method: Method, error: Error, times = 1): this {
    this.failures.set(method, { error, times });
    return this;
  }

  private check(method: Method): void {
    this.calls[method] += 1;
    const f = this.failures.get(method);
    if (f && f.times > 0) {
      f.times -= 1;
      throw f.error;
    }
  }

  async upsert(...args: Parameters<VectorStoreGateway["upsert"]>) {
    this.check("upsert");
    return this.inner.upsert(...args);
  }

  async similaritySearch(...args: Parameters<VectorStoreGateway["similaritySearch"]>) {
    this.check("similaritySearch");
    return this.inner.similaritySearch(...args);
  }

  async deleteByFileId(...args: Parameters<VectorStoreGateway["deleteByFileId"]>) {
    this.check("deleteByFileId");
    return this.inner.deleteByFileId(...args);
  }

  async count(collection: string) {
    this.check("count");
    return this.inner.count(collection);
  }

  listFileIds(collection: string) {
    return this.inner.listFileIds(collection);
  }

  async fetchChunks(...args: Parameters<VectorStoreGateway["fetchChunks"]>) {
    this.check("fetchChunks");
    return this.inner.fetchChunks(...args);
  }

  async stats(collection: string) {
    this.check("stats");
    return this.inner.stats(collection);
  }

  listCollections() {
    return this.inner.listCollections();
  }

  dropCollection(collection: string) {
    return this.inner.dropCollection(collection);
  }

  ping() {
    return this.inner.ping();
  }
}
