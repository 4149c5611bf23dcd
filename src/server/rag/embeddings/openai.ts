import OpenAI, { AzureOpenAI } from "openai";

import { EmbeddingProviderError } from "../errors.ts";
import { isAbortError } from "../retry.ts";
import { assertVectors, isRetryableStatus } from "./http.ts";
import type { EmbeddingProvider, EmbeddingsConfig } from "./types.ts";

function toProviderError(error: unknown, provider: string): unknown {
  if (isAbortError(error) || error instanceof OpenAI.APIUserAbortError) { return error; }

  if (error instanceof OpenAI.APIConnectionError) {
    return new EmbeddingProviderError(`${provider} embeddings connection failed: ${error.message}`, {
      retryable: true,
      cause: error,
    });
  }

  if (error instanceof OpenAI.APIError) {
    const status = typeof error.status === "number" ? error.status : 0;
    // 429 is either rate limiting (retry) or an exhausted quota (fatal).
    const quota = error.code === "insufficient_quota";
    return new EmbeddingProviderError(`${provider} embeddings request failed (HTTP ${status}): ${error.message}`, {
      status,
      retryable: !quota && isRetryableStatus(status),
      cause: error,
    });
  }

  return error;
}

function wrap(client: OpenAI, provider: "openai" | "azure", model: string): EmbeddingProvider {
  return {
    name: provider,
    model,
    async embed(texts, signal) {
      try {
        const response = await client.embeddings.create(
          { model, input: texts },
          signal ? { signal } : undefined,
        );
        // The API reports an index per item; order by it rather than trusting array order.
        const ordered = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
        return assertVectors(ordered, texts.length, provider);
      } catch (error: unknown) {
        throw toProviderError(error, provider);
      }
    },
  };
}

export function createOpenAIEmbeddings(cfg: Pick<EmbeddingsConfig, "model" | "timeoutMs" | "openai">): EmbeddingProvider {
  if (!cfg.openai.apiKey) {
    throw new EmbeddingProviderError("RAG_OPENAI_API_KEY (or OPENAI_API_KEY) is required for the openai provider");
  }
  const client = new OpenAI({
    apiKey: cfg.openai.apiKey,
    ...(cfg.openai.baseUrl ? { baseURL: cfg.openai.baseUrl } : {}),
    timeout: cfg.timeoutMs,
    maxRetries: 0,
  });
  return wrap(client, "openai", cfg.model);
}

export function createAzureEmbeddings(cfg: Pick<EmbeddingsConfig, "model" | "timeoutMs" | "azure">): EmbeddingProvider {
  const { apiKey, endpoint, apiVersion, deployment } = cfg.azure;
  if (!apiKey || !endpoint) {
    throw new EmbeddingProviderError(
      "RAG_AZURE_OPENAI_API_KEY and RAG_AZURE_OPENAI_ENDPOINT are required for the azure provider",
    );
  }
  const client = new AzureOpenAI({
    apiKey,
    endpoint,
    apiVersion,
    deployment: deployment ?? cfg.model,
    timeout: cfg.timeoutMs,
    maxRetries: 0,
  });
  return wrap(client, "azure", cfg.model);
}
