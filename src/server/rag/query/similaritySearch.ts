import { withRetry } from "../retry.ts";
import { compareScored } from "./similarity.ts";
import type { ChunkFilter, ScoredChunk, VectorStoreGateway } from "../vectorStore/types.ts";

export interface SimilaritySearchDeps {
  store: VectorStoreGateway;
  embeddings: { embedQuery(text: string, signal?: AbortSignal): Promise<number[]> };
  retry: { attempts: number; baseMs: number };
}

export interface SimilaritySearchInput {
  query: string;
  collections: string[];
  topK: number;
  filter?: ChunkFilter;
  signal?: AbortSignal;
}

/**
 * Embeds the query once and asks each collection for its best `topK`. With
 * several collections the lists are merged by score (chunk index, file id, then
 * collection order break ties) and cut back to `topK`.
 */
export async function similaritySearch(deps: SimilaritySearchDeps, input: SimilaritySearchInput): Promise<ScoredChunk[]> {
  const { signal } = input;
  const vector = await deps.embeddings.embedQuery(input.query, signal);
  const retry = { ...deps.retry, ...(signal ? { signal } : {}) };

  const perCollection = await Promise.all(
    input.collections.map((collection) =>
      withRetry(() => deps.store.similaritySearch(collection, vector, input.topK, input.filter), retry),
    ),
  );

  // Array.prototype.sort is stable, so equal hits keep collection order.
  return perCollection.flat().sort(compareScored).slice(0, input.topK);
}
