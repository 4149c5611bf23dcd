import { createLogger } from "../../logging.ts";
import type { OllamaClient } from "../llm/ollama.ts";
import { buildAnswerPrompt, sourceTag } from "../prompt/buildPrompt.ts";
import type { SynthesisInput, SynthesisResult, Synthesizer } from "./types.ts";

const log = createLogger("rag.agent.synthesis");

function snippet(text: string, max: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

/** Deterministic answer assembled from facts and the top-ranked passages. */
export class ExtractiveSynthesizer implements Synthesizer {
  readonly name = "extractive";
  private readonly maxPassages: number;
  private readonly maxChars: number;

  constructor(opts: { maxPassages?: number; maxChars?: number } = {}) {
    this.maxPassages = opts.maxPassages ?? 3;
    this.maxChars = opts.maxChars ?? 300;
  }

  async synthesize(input: SynthesisInput): Promise<SynthesisResult> {
    const lines: string[] = [...input.facts];
    const passages = input.evidence.slice(0, this.maxPassages);

    if (passages.length) {
      lines.push(`Most relevant passage(s) for "${input.query}":`);
      for (const e of passages) {
        lines.push(`- ${sourceTag(e)} ${snippet(e.text, this.maxChars)}`);
      }
    } else if (!input.facts.length) {
      lines.push(`No relevant content was found in ${input.collections.join(", ")} for "${input.query}".`);
    }

    if (input.cancelled) {
      lines.push(`(Cancelled after ${input.steps.length} step(s); answer is partial.)`);
    } else if (input.truncated) {
      lines.push(`(Stopped after ${input.steps.length} step(s); answer may be incomplete.)`);
    }

    return { answer: lines.join("\n"), synthesizer: this.name };
  }
}

/** Grounded answer from an Ollama model; falls back to `fallback` when the model call fails. */
export class OllamaSynthesizer implements Synthesizer {
  readonly name = "ollama";
  private readonly client: OllamaClient;
  private readonly fallback: Synthesizer;

  constructor(client: OllamaClient, fallback: Synthesizer = new ExtractiveSynthesizer()) {
    this.client = client;
    this.fallback = fallback;
  }

  async synthesize(input: SynthesisInput, signal?: AbortSignal): Promise<SynthesisResult> {
    if (input.cancelled) { return this.fallback.synthesize(input, signal); }

    try {
      const answer = await this.client.generate(
        buildAnswerPrompt({ question: input.query, evidence: input.evidence, facts: input.facts }),
        signal,
      );
      if (answer) { return { answer, synthesizer: this.name }; }
      return this.fallbackWith(input, "model returned an empty answer", signal);
    } catch (error: unknown) {
      if (signal?.aborted) { throw error; }
      return this.fallbackWith(input, error instanceof Error ? error.message : String(error), signal);
    }
  }

  private async fallbackWith(input: SynthesisInput, reason: string, signal?: AbortSignal): Promise<SynthesisResult> {
    log.warn("model synthesis failed; using fallback", { fallback: this.fallback.name, reason });
    const out = await this.fallback.synthesize(input, signal);
    return { ...out, fallbackReason: reason };
  }
}
