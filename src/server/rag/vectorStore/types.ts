export type MetadataValue = string | number | boolean | null;

export type ChunkMetadata = Record<string, MetadataValue>;

/** A chunk as written by ingestion. Keyed by (collection, fileId, chunkIndex). */
export interface ChunkRecord {
  fileId: string;
  chunkIndex: number;
  text: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface StoredChunk {
  collection: string;
  fileId: string;
  chunkIndex: number;
  text: string;
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  chunk: StoredChunk;
  score: number;
}

/** All conditions are ANDed. */
export interface ChunkFilter {
  fileIds?: string[];
  metadata?: Record<string, string | number | boolean>;
}

export interface CollectionSummary {
  name: string;
  dimension: number;
  chunkCount: number;
  createdAt: string;
}

export interface CollectionStats extends CollectionSummary {
  fileCount: number;
  files: Array<{ fileId: string; chunkCount: number }>;
}

/**
 * Collection-scoped access to stored chunks. Implementations report connectivity
 * problems as VectorStoreUnavailableError and never retry on their own.
 */
export interface VectorStoreGateway {
  /** Creates the collection on first write. Overwrites rows with the same key. */
  upsert(collection: string, chunks: ChunkRecord[]): Promise<{ upserted: number }>;
  /** Descending score; ties by ascending chunkIndex, then ascending fileId. */
  similaritySearch(collection: string, queryVector: number[], k: number, filter?: ChunkFilter): Promise<ScoredChunk[]>;
  /** Removes every chunk of the file in one transaction and returns how many went. */
  deleteByFileId(collection: string, fileId: string): Promise<number>;
  count(collection: string): Promise<number>;
  /** Distinct, sorted ascending. */
  listFileIds(collection: string): Promise<string[]>;
  /** Ordered by fileId, then chunkIndex. */
  fetchChunks(collection: string, filter: ChunkFilter, limit?: number): Promise<StoredChunk[]>;
  stats(collection: string): Promise<CollectionStats | null>;
  listCollections(): Promise<CollectionSummary[]>;
  dropCollection(collection: string): Promise<boolean>;
  ping(): Promise<void>;
}
