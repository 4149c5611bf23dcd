import { EmbeddingProviderError } from "../errors.ts";
import { assertVectors, postJson, sanitizeBaseUrl } from "./http.ts";
import type { EmbeddingProvider } from "./types.ts";

export const HF_INFERENCE_URL = "https://api-inference.huggingface.co/pipeline/feature-extraction";

/** Hosted Inference API, feature-extraction pipeline. */
export function createHuggingFaceEmbeddings(opts: {
  model: string;
  token?: string | undefined;
  timeoutMs: number;
  baseUrl?: string;
}): EmbeddingProvider {
  if (!opts.token) {
    throw new EmbeddingProviderError("HF_TOKEN is required for the huggingface embeddings provider");
  }
  const url = `${sanitizeBaseUrl(opts.baseUrl ?? HF_INFERENCE_URL)}/${opts.model}`;
  const headers = { Authorization: `Bearer ${opts.token}` };

  return {
    name: "huggingface",
    model: opts.model,
    async embed(texts, signal) {
      const json = await postJson(
        url,
        { inputs: texts, options: { wait_for_model: true } },
        { provider: "huggingface", timeoutMs: opts.timeoutMs, headers, ...(signal ? { signal } : {}) },
      );
      return assertVectors(json, texts.length, "huggingface");
    },
  };
}

/** Self-hosted text-embeddings-inference server; `model` is its base URL. */
export function createHuggingFaceTeiEmbeddings(opts: { baseUrl: string; timeoutMs: number }): EmbeddingProvider {
  const baseUrl = sanitizeBaseUrl(opts.baseUrl);

  return {
    name: "huggingfacetei",
    model: baseUrl,
    async embed(texts, signal) {
      const json = await postJson(
        `${baseUrl}/embed`,
        { inputs: texts, truncate: true },
        { provider: "huggingfacetei", timeoutMs: opts.timeoutMs, ...(signal ? { signal } : {}) },
      );
      return assertVectors(json, texts.length, "huggingfacetei");
    },
  };
}
