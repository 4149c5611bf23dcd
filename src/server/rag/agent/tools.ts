import { z } from "zod";

import { InvalidQueryError } from "../errors.ts";
import { withRetry } from "../retry.ts";
import { similaritySearch } from "../query/similaritySearch.ts";
import type { StoredChunk } from "../vectorStore/types.ts";
import type { AgentTool, Evidence, RegisteredTool, ToolContext, ToolOutput } from "./types.ts";

export function defineTool<S extends z.ZodType>(tool: AgentTool<S>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    async invoke(rawInput, ctx) {
      const parsed = tool.inputSchema.safeParse(rawInput ?? {});
      if (!parsed.success) {
        const details = parsed.error.issues.map((i) => ({ field: i.path.join(".") || "input", message: i.message }));
        throw new InvalidQueryError(`Invalid input for tool ${tool.name}`, details);
      }
      return tool.execute(parsed.data, ctx);
    },
  };
}

function targetCollections(ctx: ToolContext, collection: string | undefined): string[] {
  if (collection === undefined) { return ctx.collections; }
  if (!ctx.collections.includes(collection)) {
    throw new InvalidQueryError(`Collection "${collection}" is not part of this query`);
  }
  return [collection];
}

function toEvidence(chunk: StoredChunk, score: number | null): Evidence {
  return {
    collection: chunk.collection,
    fileId: chunk.fileId,
    chunkIndex: chunk.chunkIndex,
    text: chunk.text,
    score,
    metadata: chunk.metadata,
  };
}

const collectionField = z.string().trim().min(1).optional().describe("Collection to use; all query collections when omitted");

export const similaritySearchTool = defineTool({
  name: "similaritySearch",
  description: "Find the passages most similar in meaning to a search text.",
  inputSchema: z.object({
    query: z.string().trim().min(1).describe("Text to search for"),
    collection: collectionField,
    topK: z.number().int().min(1).max(50).optional(),
  }),
  async execute(input, ctx): Promise<ToolOutput> {
    const collections = targetCollections(ctx, input.collection);
    const hits = await similaritySearch(ctx, {
      query: input.query,
      collections,
      topK: input.topK ?? ctx.topK,
      ...(ctx.signal ? { signal: ctx.signal } : {}),
    });

    const best = hits[0];
    return {
      summary: best
        ? `${hits.length} passage(s) from ${collections.join(", ")}; best ${best.chunk.fileId}#${best.chunk.chunkIndex} (score ${best.score.toFixed(3)})`
        : `no passages found in ${collections.join(", ")}`,
      evidence: hits.map((h) => toEvidence(h.chunk, h.score)),
    };
  },
});

export const metadataFilterLookupTool = defineTool({
  name: "metadataFilterLookup",
  description: "Read passages by file id and/or metadata fields such as filename or page, in document order.",
  inputSchema: z
    .object({
      collection: collectionField,
      fileIds: z.array(z.string().trim().min(1)).min(1).optional(),
      metadata: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).optional(),
      limit: z.number().int().min(1).max(100).optional(),
    })
    .refine((v) => Boolean(v.fileIds) || Boolean(v.metadata && Object.keys(v.metadata).length), {
      message: "fileIds or metadata is required",
    }),
  async execute(input, ctx): Promise<ToolOutput> {
    const collections = targetCollections(ctx, input.collection);
    const limit = input.limit ?? ctx.topK;
    const filter = {
      ...(input.fileIds ? { fileIds: input.fileIds } : {}),
      ...(input.metadata ? { metadata: input.metadata } : {}),
    };
    const retry = { ...ctx.retry, ...(ctx.signal ? { signal: ctx.signal } : {}) };

    const chunks: StoredChunk[] = [];
    for (const collection of collections) {
      if (chunks.length >= limit) { break; }
      const found = await withRetry(() => ctx.store.fetchChunks(collection, filter, limit - chunks.length), retry);
      chunks.push(...found);
    }

    const files = new Set(chunks.map((c) => c.fileId));
    return {
      summary: chunks.length
        ? `${chunks.length} passage(s) from ${files.size} file(s) matched ${JSON.stringify(filter)}`
        : `no passages matched ${JSON.stringify(filter)}`,
      evidence: chunks.map((c) => toEvidence(c, null)),
    };
  },
});

export const countAggregateTool = defineTool({
  name: "countAggregate",
  description: "Count stored passages and documents, optionally broken down per file.",
  inputSchema: z.object({
    collection: collectionField,
    groupBy: z.enum(["none", "file"]).optional(),
  }),
  async execute(input, ctx): Promise<ToolOutput> {
    const collections = targetCollections(ctx, input.collection);
    const retry = { ...ctx.retry, ...(ctx.signal ? { signal: ctx.signal } : {}) };

    const facts: string[] = [];
    const data: Array<{ collection: string; chunkCount: number; fileCount: number; files?: Array<{ fileId: string; chunkCount: number }> }> = [];

    for (const collection of collections) {
      const stats = await withRetry(() => ctx.store.stats(collection), retry);
      const chunkCount = stats?.chunkCount ?? 0;
      const fileCount = stats?.fileCount ?? 0;
      facts.push(`Collection "${collection}" holds ${chunkCount} chunk(s) across ${fileCount} document(s).`);
      data.push({
        collection,
        chunkCount,
        fileCount,
        ...(input.groupBy === "file" ? { files: stats?.files ?? [] } : {}),
      });
    }

    return { summary: facts.join(" "), evidence: [], facts, data };
  },
});

export const DEFAULT_TOOLS: readonly RegisteredTool[] = [similaritySearchTool, metadataFilterLookupTool, countAggregateTool];

/** The default tools plus any extras; a later tool replaces an earlier one with the same name. */
export function createToolRegistry(extra: RegisteredTool[] = []): RegisteredTool[] {
  const byName = new Map<string, RegisteredTool>();
  for (const tool of [...DEFAULT_TOOLS, ...extra]) {
    byName.set(tool.name, tool);
  }
  return [...byName.values()];
}
