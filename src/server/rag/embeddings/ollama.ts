import { EmbeddingProviderError } from "../errors.ts";
import { field } from "../json.ts";
import { assertVectors, postJson, sanitizeBaseUrl } from "./http.ts";
import type { EmbeddingProvider } from "./types.ts";

export interface OllamaEmbeddingsOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export function createOllamaEmbeddings(opts: OllamaEmbeddingsOptions): EmbeddingProvider {
  const baseUrl = sanitizeBaseUrl(opts.baseUrl);
  const model = opts.model.trim();

  return {
    name: "ollama",
    model,
    async embed(texts, signal) {
      const json = await postJson(
        `${baseUrl}/api/embed`,
        { model, input: texts },
        { provider: "ollama", timeoutMs: opts.timeoutMs, ...(signal ? { signal } : {}) },
      );

      const embeddings = field(json, "embeddings");
      if (!Array.isArray(embeddings)) {
        throw new EmbeddingProviderError(
          `Ollama /api/embed did not return an embeddings array for model "${model}". ` +
            "Verify Ollama is running and the model supports embeddings.",
        );
      }
      return assertVectors(embeddings, texts.length, "ollama");
    },
  };
}
