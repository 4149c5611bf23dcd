import { z } from "zod";

import {
  AgenticExecutionError,
  InvalidQueryError,
  RagError,
  toErrorPayload,
  type RagErrorPayload,
} from "../errors.ts";
import type { AgenticEngine } from "../agent/engine.ts";
import type { Evidence, TraceStep } from "../agent/types.ts";
import { createLogger } from "../../logging.ts";
import type { ChunkMetadata } from "../vectorStore/types.ts";
import { similaritySearch, type SimilaritySearchDeps } from "./similaritySearch.ts";

export const DEFAULT_TOP_K = 4;

export const QueryRequestSchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  mode: z.enum(["semantic", "agentic"]).default("semantic"),
  collections: z.array(z.string().trim().min(1, "collection names must not be empty")).min(1, "collections must not be empty"),
  topK: z.number().int("topK must be an integer").min(1, "topK must be >= 1").max(100, "topK must be <= 100").default(DEFAULT_TOP_K),
});

export type QueryRequest = z.output<typeof QueryRequestSchema>;

export interface QueryObject {
  file_id: string;
  chunk_index: number;
  text: string;
  /** Null for agent evidence read by metadata lookup rather than ranked. */
  score: number | null;
  collection: string;
  metadata: ChunkMetadata;
}

export interface QueryResponse {
  mode: "semantic" | "agentic";
  objects: QueryObject[];
  answer?: string;
  reasoning_trace?: TraceStep[];
  truncated?: boolean;
  cancelled?: boolean;
  synthesizer?: string;
  synthesis_fallback?: string;
}

export type QueryOutcome =
  | { ok: true; response: QueryResponse }
  | { ok: false; error: RagErrorPayload; reasoning_trace?: TraceStep[] };

export interface QueryRouterDeps extends SimilaritySearchDeps {
  agent: AgenticEngine;
}

const log = createLogger("rag.query");

export function parseQueryRequest(input: unknown): QueryRequest {
  const parsed = QueryRequestSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => ({ field: i.path.join(".") || "body", message: i.message }));
    const first = details[0];
    throw new InvalidQueryError(first ? `${first.field}: ${first.message}` : "Invalid query", details);
  }
  // Duplicate collections would double-count hits when merging.
  return { ...parsed.data, collections: [...new Set(parsed.data.collections)] };
}

function fromEvidence(e: Evidence): QueryObject {
  return {
    file_id: e.fileId,
    chunk_index: e.chunkIndex,
    text: e.text,
    score: e.score,
    collection: e.collection,
    metadata: e.metadata,
  };
}

/**
 * Validates a query and hands it to plain similarity search or to the agent.
 * Failures come back as `{ ok: false, error }` envelopes, never as exceptions.
 */
export class QueryRouter {
  private readonly deps: QueryRouterDeps;

  constructor(deps: QueryRouterDeps) {
    this.deps = deps;
  }

  async query(input: unknown, opts: { signal?: AbortSignal } = {}): Promise<QueryOutcome> {
    const startedAt = Date.now();
    let mode: QueryRequest["mode"] | undefined;

    try {
      const req = parseQueryRequest(input);
      mode = req.mode;
      const signal = opts.signal;

      if (req.mode === "semantic") {
        const hits = await similaritySearch(this.deps, {
          query: req.query,
          collections: req.collections,
          topK: req.topK,
          ...(signal ? { signal } : {}),
        });
        log.info("semantic query", { collections: req.collections, topK: req.topK, hits: hits.length, ms: Date.now() - startedAt });
        return {
          ok: true,
          response: {
            mode: "semantic",
            objects: hits.map((h) => ({
              file_id: h.chunk.fileId,
              chunk_index: h.chunk.chunkIndex,
              text: h.chunk.text,
              score: h.score,
              collection: h.chunk.collection,
              metadata: h.chunk.metadata,
            })),
          },
        };
      }

      const run = await this.deps.agent.run({
        query: req.query,
        collections: req.collections,
        topK: req.topK,
        ...(signal ? { signal } : {}),
      });
      log.info("agentic query", {
        collections: req.collections,
        steps: run.trace.length,
        truncated: run.truncated,
        cancelled: run.cancelled,
        ms: Date.now() - startedAt,
      });

      return {
        ok: true,
        response: {
          mode: "agentic",
          objects: run.evidence.map(fromEvidence),
          answer: run.answer,
          reasoning_trace: run.trace,
          truncated: run.truncated,
          cancelled: run.cancelled,
          synthesizer: run.synthesis.synthesizer,
          ...(run.synthesis.fallbackReason ? { synthesis_fallback: run.synthesis.fallbackReason } : {}),
        },
      };
    } catch (error: unknown) {
      const payload = toErrorPayload(error);
      if (error instanceof RagError) {
        log.warn("query failed", { mode, kind: payload.kind, reason: payload.message });
      } else {
        log.error("query failed", { mode, error });
      }

      if (error instanceof AgenticExecutionError) {
        return { ok: false, error: payload, reasoning_trace: error.trace };
      }
      return { ok: false, error: payload };
    }
  }
}
