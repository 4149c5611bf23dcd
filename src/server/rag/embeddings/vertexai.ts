import { GoogleGenerativeAI, TaskType } from "@google/generative-ai";

import { EmbeddingProviderError } from "../errors.ts";
import { field } from "../json.ts";
import { isAbortError } from "../retry.ts";
import { assertVectors, isRetryableStatus } from "./http.ts";
import type { EmbeddingProvider, EmbeddingsConfig } from "./types.ts";

function statusOf(error: unknown): number {
  const status = field(error, "status");
  return typeof status === "number" ? status : 0;
}

export function createVertexAiEmbeddings(cfg: Pick<EmbeddingsConfig, "model" | "timeoutMs" | "vertexai">): EmbeddingProvider {
  if (!cfg.vertexai.apiKey) {
    throw new EmbeddingProviderError("GOOGLE_API_KEY is required for the vertexai embeddings provider");
  }
  const model = new GoogleGenerativeAI(cfg.vertexai.apiKey).getGenerativeModel(
    { model: cfg.model },
    { timeout: cfg.timeoutMs },
  );

  return {
    name: "vertexai",
    model: cfg.model,
    async embed(texts, signal, purpose = "document") {
      try {
        const result = await model.batchEmbedContents(
          {
            requests: texts.map((text) => ({
              content: { role: "user", parts: [{ text }] },
              taskType: purpose === "query" ? TaskType.RETRIEVAL_QUERY : TaskType.RETRIEVAL_DOCUMENT,
            })),
          },
          signal ? { signal } : {},
        );
        return assertVectors(result.embeddings.map((e) => e.values), texts.length, "vertexai");
      } catch (error: unknown) {
        if (isAbortError(error) || error instanceof EmbeddingProviderError) { throw error; }
        const status = statusOf(error);
        const message = error instanceof Error ? error.message : String(error ?? "unknown error");
        throw new EmbeddingProviderError(`vertexai embeddings request failed: ${message}`, {
          status,
          retryable: status === 0 || isRetryableStatus(status),
          cause: error,
        });
      }
    },
  };
}
