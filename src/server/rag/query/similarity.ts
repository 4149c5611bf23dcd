import type { ScoredChunk } from "../vectorStore/types.ts";

/** Cosine similarity in [-1, 1]. Zero-norm or mismatched vectors score -1. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) { return -1; }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const av = a[i] ?? Number.NaN;
    const bv = b[i] ?? Number.NaN;
    if (!Number.isFinite(av) || !Number.isFinite(bv)) { return -1; }

    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }

  if (normA <= 0 || normB <= 0) { return -1; }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) { return b.score - a.score; }
  if (a.chunk.chunkIndex !== b.chunk.chunkIndex) { return a.chunk.chunkIndex - b.chunk.chunkIndex; }
  if (a.chunk.fileId !== b.chunk.fileId) { return a.chunk.fileId < b.chunk.fileId ? -1 : 1; }
  return 0;
}

export function isFiniteVector(value: unknown): value is number[] {
  return Array.isArray(value) && value.length > 0 && value.every((v) => typeof v === "number" && Number.isFinite(v));
}
