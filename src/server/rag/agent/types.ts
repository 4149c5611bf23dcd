import type { z } from "zod";

import type { ChunkMetadata, VectorStoreGateway } from "../vectorStore/types.ts";

/** A chunk the agent has looked at. `score` is null for lookups that do not rank. */
export interface Evidence {
  collection: string;
  fileId: string;
  chunkIndex: number;
  text: string;
  score: number | null;
  metadata: ChunkMetadata;
}

export interface ToolOutput {
  summary: string;
  evidence: Evidence[];
  /** Statements an answer should carry verbatim, e.g. computed counts. */
  facts?: string[];
  data?: unknown;
}

export interface ToolContext {
  store: VectorStoreGateway;
  embeddings: { embedQuery(text: string, signal?: AbortSignal): Promise<number[]> };
  collections: string[];
  topK: number;
  retry: { attempts: number; baseMs: number };
  signal?: AbortSignal;
}

export interface AgentTool<S extends z.ZodType = z.ZodType> {
  name: string;
  description: string;
  inputSchema: S;
  execute(input: z.output<S>, ctx: ToolContext): Promise<ToolOutput>;
}

/** Type-erased tool as the registry holds it; input is validated before it runs. */
export interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: z.ZodType;
  invoke(rawInput: unknown, ctx: ToolContext): Promise<ToolOutput>;
}

export type TraceStatus = "ok" | "failed";

export interface TraceStep {
  step: number;
  tool: string;
  input: unknown;
  status: TraceStatus;
  summary: string;
  durationMs: number;
  evidenceCount: number;
  error?: string;
  rationale?: string;
}

export type Decision =
  | { kind: "invoke"; tool: string; input: unknown; rationale?: string }
  | { kind: "synthesize"; rationale?: string };

export interface PolicyState {
  query: string;
  collections: string[];
  topK: number;
  tools: RegisteredTool[];
  steps: TraceStep[];
  evidence: Evidence[];
}

/** Picks the next step. Deterministic policies return the same decision for the same state. */
export interface SelectionPolicy {
  readonly name: string;
  next(state: PolicyState, signal?: AbortSignal): Promise<Decision>;
}

export interface SynthesisInput {
  query: string;
  collections: string[];
  evidence: Evidence[];
  facts: string[];
  steps: TraceStep[];
  truncated: boolean;
  cancelled: boolean;
}

export interface SynthesisResult {
  answer: string;
  synthesizer: string;
  fallbackReason?: string;
}

export interface Synthesizer {
  readonly name: string;
  synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<SynthesisResult>;
}

export interface AgentRunResult {
  answer: string;
  evidence: Evidence[];
  trace: TraceStep[];
  truncated: boolean;
  cancelled: boolean;
  synthesis: { synthesizer: string; fallbackReason?: string };
}
