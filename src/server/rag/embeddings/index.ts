import { createBedrockEmbeddings } from "./bedrock.ts";
import { EmbeddingGateway } from "./gateway.ts";
import { createHuggingFaceEmbeddings, createHuggingFaceTeiEmbeddings } from "./huggingface.ts";
import { createOllamaEmbeddings } from "./ollama.ts";
import { createAzureEmbeddings, createOpenAIEmbeddings } from "./openai.ts";
import { createVertexAiEmbeddings } from "./vertexai.ts";
import type { EmbeddingProvider, EmbeddingsConfig } from "./types.ts";

export function createEmbeddingProvider(cfg: EmbeddingsConfig): EmbeddingProvider {
  switch (cfg.provider) {
    case "openai":
      return createOpenAIEmbeddings(cfg);
    case "azure":
      return createAzureEmbeddings(cfg);
    case "huggingface":
      return createHuggingFaceEmbeddings({ model: cfg.model, token: cfg.huggingface.token, timeoutMs: cfg.timeoutMs });
    case "huggingfacetei":
      return createHuggingFaceTeiEmbeddings({ baseUrl: cfg.model, timeoutMs: cfg.timeoutMs });
    case "ollama":
      return createOllamaEmbeddings({ baseUrl: cfg.ollama.baseUrl, model: cfg.model, timeoutMs: cfg.timeoutMs });
    case "bedrock":
      return createBedrockEmbeddings(cfg);
    case "vertexai":
      return createVertexAiEmbeddings(cfg);
  }
}

export function createEmbeddingGateway(cfg: EmbeddingsConfig, provider = createEmbeddingProvider(cfg)): EmbeddingGateway {
  return new EmbeddingGateway(provider, {
    batchSize: cfg.batchSize,
    maxConcurrency: cfg.maxConcurrency,
    retry: cfg.retry,
  });
}

export { EmbeddingGateway } from "./gateway.ts";
export type { EmbedPurpose, EmbeddingProvider, EmbeddingsConfig, EmbeddingsProviderName } from "./types.ts";
