import { openDb, type Db } from "../../db/index.ts";
import { RagError, SchemaMismatchError, VectorStoreUnavailableError } from "../errors.ts";
import { compareScored, cosineSimilarity, isFiniteVector } from "../query/similarity.ts";
import type {
  ChunkFilter,
  ChunkMetadata,
  ChunkRecord,
  CollectionStats,
  CollectionSummary,
  ScoredChunk,
  StoredChunk,
  VectorStoreGateway,
} from "./types.ts";

interface ChunkRow {
  collection: string;
  file_id: string;
  chunk_index: number;
  text: string;
  metadata_json: string;
}

interface EmbeddedChunkRow extends ChunkRow {
  embedding_json: string;
}

interface CollectionRow {
  name: string;
  dimension: number;
  created_at: string;
  chunk_count: number;
}

type SqlParam = string | number | null;

const UNAVAILABLE_CODES = new Set([
  "SQLITE_BUSY",
  "SQLITE_LOCKED",
  "SQLITE_CANTOPEN",
  "SQLITE_IOERR",
  "SQLITE_FULL",
  "SQLITE_READONLY",
  "SQLITE_NOTADB",
  "SQLITE_CORRUPT",
]);

function sqliteCode(error: unknown): string {
  if (!error || typeof error !== "object" || !("code" in error)) { return ""; }
  return typeof error.code === "string" ? error.code : "";
}

/** Classifies driver failures; anything that is not a connectivity/storage problem passes through. */
function mapStoreError(error: unknown, collection?: string): unknown {
  if (error instanceof RagError) { return error; }

  const code = sqliteCode(error);
  const base = code.split("_").slice(0, 2).join("_");
  const message = error instanceof Error ? error.message : String(error ?? "unknown error");
  const closed = /database connection is not open/i.test(message);

  if (UNAVAILABLE_CODES.has(base) || closed) {
    return new VectorStoreUnavailableError(`Vector store unavailable: ${message}`, {
      cause: error,
      ...(collection ? { context: { collection } } : {}),
    });
  }
  return error;
}

function parseMetadata(json: string): ChunkMetadata {
  try {
    const parsed: unknown = JSON.parse(json);
    if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
      const out: ChunkMetadata = {};
      for (const [key, value] of Object.entries(parsed)) {
        if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
          out[key] = value;
        }
      }
      return out;
    }
  } catch {
    return {};
  }
  return {};
}

function parseEmbedding(json: string): number[] | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isFiniteVector(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    collection: row.collection,
    fileId: row.file_id,
    chunkIndex: row.chunk_index,
    text: row.text,
    metadata: parseMetadata(row.metadata_json),
  };
}

// json_extract returns 1/0 for JSON booleans.
function toSqlValue(value: string | number | boolean): SqlParam {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

function buildWhere(collection: string, filter?: ChunkFilter): { sql: string; params: SqlParam[] } {
  const clauses = ["collection = ?"];
  const params: SqlParam[] = [collection];

  const fileIds = filter?.fileIds;
  if (fileIds) {
    if (fileIds.length === 0) {
      clauses.push("0");
    } else {
      clauses.push(`file_id IN (${fileIds.map(() => "?").join(", ")})`);
      params.push(...fileIds);
    }
  }

  for (const [key, value] of Object.entries(filter?.metadata ?? {})) {
    clauses.push("json_extract(metadata_json, ?) = ?");
    params.push(`$."${key.replace(/"/g, "")}"`, toSqlValue(value));
  }

  return { sql: clauses.join(" AND "), params };
}

/**
 * Vector store over a single SQLite database. Embeddings are kept as JSON arrays
 * and scored in process with cosine similarity.
 */
export class SqliteVectorStore implements VectorStoreGateway {
  readonly db: Db;

  constructor(db: Db) {
    this.db = db;
  }

  static open(dbPath: string): SqliteVectorStore {
    try {
      return new SqliteVectorStore(openDb(dbPath));
    } catch (error: unknown) {
      throw mapStoreError(error);
    }
  }

  close(): void {
    if (this.db.open) { this.db.close(); }
  }

  private run<T>(collection: string | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (error: unknown) {
      throw mapStoreError(error, collection);
    }
  }

  private collectionDimension(collection: string): number | null {
    const row = this.db
      .prepare<[string], { dimension: number }>("SELECT dimension FROM collections WHERE name = ?")
      .get(collection);
    return row ? row.dimension : null;
  }

  async upsert(collection: string, chunks: ChunkRecord[]): Promise<{ upserted: number }> {
    if (chunks.length === 0) { return { upserted: 0 }; }

    const first = chunks[0];
    const dimension = first ? first.embedding.length : 0;
    for (const chunk of chunks) {
      if (!isFiniteVector(chunk.embedding)) {
        throw new SchemaMismatchError(
          `Chunk ${chunk.fileId}#${chunk.chunkIndex} has an empty or non-numeric embedding`,
          { context: { collection, fileId: chunk.fileId } },
        );
      }
      if (chunk.embedding.length !== dimension) {
        throw new SchemaMismatchError(
          `Embedding dimension ${chunk.embedding.length} does not match batch dimension ${dimension}`,
          { context: { collection, fileId: chunk.fileId } },
        );
      }
    }

    return this.run(collection, () => {
      const insertCollection = this.db.prepare(
        "INSERT INTO collections (name, dimension, created_at) VALUES (?, ?, ?) ON CONFLICT(name) DO NOTHING",
      );
      const upsertChunk = this.db.prepare(
        `INSERT INTO chunks (collection, file_id, chunk_index, text, metadata_json, embedding_json)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(collection, file_id, chunk_index) DO UPDATE SET
           text = excluded.text,
           metadata_json = excluded.metadata_json,
           embedding_json = excluded.embedding_json`,
      );

      const tx = this.db.transaction(() => {
        insertCollection.run(collection, dimension, new Date().toISOString());
        const existing = this.collectionDimension(collection);
        if (existing !== dimension) {
          throw new SchemaMismatchError(
            `Collection "${collection}" stores ${existing}-dimensional vectors, got ${dimension}`,
            { context: { collection } },
          );
        }

        for (const chunk of chunks) {
          upsertChunk.run(
            collection,
            chunk.fileId,
            chunk.chunkIndex,
            chunk.text,
            JSON.stringify(chunk.metadata),
            JSON.stringify(chunk.embedding),
          );
        }
      });

      tx();
      return { upserted: chunks.length };
    });
  }

  async similaritySearch(
    collection: string,
    queryVector: number[],
    k: number,
    filter?: ChunkFilter,
  ): Promise<ScoredChunk[]> {
    if (k <= 0) { return []; }

    return this.run(collection, () => {
      const dimension = this.collectionDimension(collection);
      if (dimension === null) { return []; }
      if (queryVector.length !== dimension) {
        throw new SchemaMismatchError(
          `Query vector has ${queryVector.length} dimensions, collection "${collection}" has ${dimension}`,
          { context: { collection } },
        );
      }

      const where = buildWhere(collection, filter);
      const rows = this.db
        .prepare<SqlParam[], EmbeddedChunkRow>(
          `SELECT collection, file_id, chunk_index, text, metadata_json, embedding_json FROM chunks WHERE ${where.sql}`,
        )
        .all(...where.params);

      const scored: ScoredChunk[] = [];
      for (const row of rows) {
        const embedding = parseEmbedding(row.embedding_json);
        if (!embedding) { continue; }
        scored.push({ chunk: toStoredChunk(row), score: cosineSimilarity(queryVector, embedding) });
      }

      return scored.sort(compareScored).slice(0, Math.floor(k));
    });
  }

  async deleteByFileId(collection: string, fileId: string): Promise<number> {
    return this.run(collection, () => {
      const tx = this.db.transaction(() => {
        return this.db.prepare("DELETE FROM chunks WHERE collection = ? AND file_id = ?").run(collection, fileId).changes;
      });
      return tx();
    });
  }

  async count(collection: string): Promise<number> {
    return this.run(collection, () => {
      const row = this.db
        .prepare<[string], { n: number }>("SELECT COUNT(*) AS n FROM chunks WHERE collection = ?")
        .get(collection);
      return row?.n ?? 0;
    });
  }

  async listFileIds(collection: string): Promise<string[]> {
    return this.run(collection, () => {
      return this.db
        .prepare<[string], { file_id: string }>(
          "SELECT DISTINCT file_id FROM chunks WHERE collection = ? ORDER BY file_id ASC",
        )
        .all(collection)
        .map((r) => r.file_id);
    });
  }

  async fetchChunks(collection: string, filter: ChunkFilter, limit = 100): Promise<StoredChunk[]> {
    return this.run(collection, () => {
      const where = buildWhere(collection, filter);
      return this.db
        .prepare<SqlParam[], ChunkRow>(
          `SELECT collection, file_id, chunk_index, text, metadata_json FROM chunks WHERE ${where.sql}
           ORDER BY file_id ASC, chunk_index ASC LIMIT ?`,
        )
        .all(...where.params, Math.max(0, Math.floor(limit)))
        .map(toStoredChunk);
    });
  }

  async stats(collection: string): Promise<CollectionStats | null> {
    return this.run(collection, () => {
      const summary = this.db
        .prepare<[string], CollectionRow>(
          `SELECT c.name, c.dimension, c.created_at, COUNT(k.file_id) AS chunk_count
           FROM collections c LEFT JOIN chunks k ON k.collection = c.name
           WHERE c.name = ? GROUP BY c.name`,
        )
        .get(collection);
      if (!summary) { return null; }

      const files = this.db
        .prepare<[string], { file_id: string; n: number }>(
          "SELECT file_id, COUNT(*) AS n FROM chunks WHERE collection = ? GROUP BY file_id ORDER BY file_id ASC",
        )
        .all(collection)
        .map((r) => ({ fileId: r.file_id, chunkCount: r.n }));

      return {
        name: summary.name,
        dimension: summary.dimension,
        createdAt: summary.created_at,
        chunkCount: summary.chunk_count,
        fileCount: files.length,
        files,
      };
    });
  }

  async listCollections(): Promise<CollectionSummary[]> {
    return this.run(undefined, () => {
      return this.db
        .prepare<[], CollectionRow>(
          `SELECT c.name, c.dimension, c.created_at, COUNT(k.file_id) AS chunk_count
           FROM collections c LEFT JOIN chunks k ON k.collection = c.name
           GROUP BY c.name ORDER BY c.name ASC`,
        )
        .all()
        .map((r) => ({ name: r.name, dimension: r.dimension, createdAt: r.created_at, chunkCount: r.chunk_count }));
    });
  }

  async dropCollection(collection: string): Promise<boolean> {
    return this.run(collection, () => {
      const tx = this.db.transaction(() => {
        this.db.prepare("DELETE FROM chunks WHERE collection = ?").run(collection);
        return this.db.prepare("DELETE FROM collections WHERE name = ?").run(collection).changes > 0;
      });
      return tx();
    });
  }

  async ping(): Promise<void> {
    this.run(undefined, () => this.db.prepare("SELECT 1").get());
  }
}
