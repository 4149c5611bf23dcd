import { AgenticExecutionError, toOneLine } from "../errors.ts";
import { isAbortError } from "../retry.ts";
import { createLogger } from "../../logging.ts";
import { ExtractiveSynthesizer } from "./synthesizer.ts";
import type {
  AgentRunResult,
  Decision,
  Evidence,
  RegisteredTool,
  SelectionPolicy,
  SynthesisInput,
  SynthesisResult,
  Synthesizer,
  ToolContext,
  TraceStep,
} from "./types.ts";

export interface AgenticEngineOptions {
  tools: RegisteredTool[];
  policy: SelectionPolicy;
  synthesizer: Synthesizer;
  maxSteps: number;
}

export interface AgenticEngineDeps {
  store: ToolContext["store"];
  embeddings: ToolContext["embeddings"];
  retry: ToolContext["retry"];
}

export interface AgentRunInput {
  query: string;
  collections: string[];
  topK: number;
  signal?: AbortSignal;
}

const log = createLogger("rag.agent");

function evidenceKey(e: Evidence): string {
  return `${e.collection}\u0000${e.fileId}\u0000${e.chunkIndex}`;
}

/** Score descending (unscored last), then chunk index, then file id. */
export function compareEvidence(a: Evidence, b: Evidence): number {
  const sa = a.score ?? Number.NEGATIVE_INFINITY;
  const sb = b.score ?? Number.NEGATIVE_INFINITY;
  if (sa !== sb) { return sb - sa; }
  if (a.chunkIndex !== b.chunkIndex) { return a.chunkIndex - b.chunkIndex; }
  if (a.fileId !== b.fileId) { return a.fileId < b.fileId ? -1 : 1; }
  return 0;
}

function errorMessage(error: unknown): string {
  return toOneLine(error instanceof Error ? error.message : String(error ?? "unknown error"));
}

/**
 * Step loop over a tool registry: the policy picks a tool, the engine runs it
 * and records the step, until the policy asks for synthesis or asks for a tool
 * after `maxSteps` calls have been made (the run is then `truncated`). A failed step is recorded and the loop goes on, except
 * when nothing at all has been gathered after the first step.
 */
export class AgenticEngine {
  private readonly tools: Map<string, RegisteredTool>;
  private readonly policy: SelectionPolicy;
  private readonly synthesizer: Synthesizer;
  private readonly fallbackSynthesizer = new ExtractiveSynthesizer();
  readonly maxSteps: number;
  private readonly deps: AgenticEngineDeps;

  constructor(opts: AgenticEngineOptions, deps: AgenticEngineDeps) {
    if (!Number.isInteger(opts.maxSteps) || opts.maxSteps < 1) {
      throw new RangeError(`maxSteps must be a positive integer (got ${opts.maxSteps})`);
    }
    this.tools = new Map(opts.tools.map((t) => [t.name, t]));
    this.policy = opts.policy;
    this.synthesizer = opts.synthesizer;
    this.maxSteps = opts.maxSteps;
    this.deps = deps;
  }

  get toolNames(): string[] {
    return [...this.tools.keys()];
  }

  async run(input: AgentRunInput): Promise<AgentRunResult> {
    const { signal } = input;
    const steps: TraceStep[] = [];
    const evidence = new Map<string, Evidence>();
    const facts: string[] = [];
    let truncated = false;
    let cancelled = false;

    const ctx: ToolContext = {
      ...this.deps,
      collections: input.collections,
      topK: input.topK,
      ...(signal ? { signal } : {}),
    };
    const nothingGathered = (): boolean => evidence.size === 0 && facts.length === 0;
    const sortedEvidence = (): Evidence[] => [...evidence.values()].sort(compareEvidence);

    for (;;) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      let decision: Decision;
      try {
        decision = await this.policy.next(
          {
            query: input.query,
            collections: input.collections,
            topK: input.topK,
            tools: [...this.tools.values()],
            steps: [...steps],
            evidence: sortedEvidence(),
          },
          signal,
        );
      } catch (error: unknown) {
        if (signal?.aborted || isAbortError(error)) {
          cancelled = true;
          break;
        }
        if (steps.length === 0) {
          throw new AgenticExecutionError(`Tool selection failed: ${errorMessage(error)}`, steps, { cause: error });
        }
        truncated = steps.length >= this.maxSteps;
        log.warn("tool selection failed; synthesizing from gathered evidence", { reason: errorMessage(error) });
        break;
      }

      if (decision.kind === "synthesize") { break; }
      // Out of budget only when the policy still wanted another tool.
      if (steps.length >= this.maxSteps) {
        truncated = true;
        break;
      }

      const stepNo = steps.length + 1;
      const startedAt = Date.now();
      const tool = this.tools.get(decision.tool);
      const rationale = decision.rationale ? { rationale: decision.rationale } : {};

      try {
        if (!tool) {
          throw new Error(`Unknown tool "${decision.tool}"`);
        }
        const output = await tool.invoke(decision.input, ctx);

        for (const e of output.evidence) {
          const key = evidenceKey(e);
          const prev = evidence.get(key);
          if (!prev || (e.score ?? Number.NEGATIVE_INFINITY) > (prev.score ?? Number.NEGATIVE_INFINITY)) {
            evidence.set(key, e);
          }
        }
        facts.push(...(output.facts ?? []));

        steps.push({
          step: stepNo,
          tool: decision.tool,
          input: decision.input,
          status: "ok",
          summary: output.summary,
          durationMs: Date.now() - startedAt,
          evidenceCount: output.evidence.length,
          ...rationale,
        });
      } catch (error: unknown) {
        const aborted = Boolean(signal?.aborted) || isAbortError(error);
        const message = aborted ? "cancelled" : errorMessage(error);
        steps.push({
          step: stepNo,
          tool: decision.tool,
          input: decision.input,
          status: "failed",
          summary: `${decision.tool} failed`,
          durationMs: Date.now() - startedAt,
          evidenceCount: 0,
          error: message,
          ...rationale,
        });
        log.warn("agent step failed", { step: stepNo, tool: decision.tool, reason: message });

        if (aborted) {
          cancelled = true;
          break;
        }
        if (stepNo === 1 && nothingGathered()) {
          throw new AgenticExecutionError(`First step (${decision.tool}) failed: ${message}`, steps, {
            context: { step: stepNo },
            cause: error,
          });
        }
      }
    }

    const ranked = sortedEvidence();
    const synthesisInput: SynthesisInput = {
      query: input.query,
      collections: input.collections,
      evidence: ranked,
      facts,
      steps,
      truncated,
      cancelled,
    };

    let synthesis: SynthesisResult;
    if (cancelled) {
      synthesis = await this.fallbackSynthesizer.synthesize(synthesisInput);
    } else {
      try {
        synthesis = await this.synthesizer.synthesize(synthesisInput, signal);
      } catch (error: unknown) {
        if (!(signal?.aborted || isAbortError(error))) { throw error; }
        cancelled = true;
        synthesis = await this.fallbackSynthesizer.synthesize({ ...synthesisInput, cancelled });
      }
    }

    log.info("agent run finished", {
      steps: steps.length,
      evidence: ranked.length,
      truncated,
      cancelled,
      synthesizer: synthesis.synthesizer,
    });

    return {
      answer: synthesis.answer,
      evidence: ranked,
      trace: steps,
      truncated,
      cancelled,
      synthesis: {
        synthesizer: synthesis.synthesizer,
        ...(synthesis.fallbackReason ? { fallbackReason: synthesis.fallbackReason } : {}),
      },
    };
  }
}
