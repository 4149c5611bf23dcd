export const EMBEDDINGS_PROVIDERS = [
  "openai",
  "azure",
  "huggingface",
  "huggingfacetei",
  "ollama",
  "bedrock",
  "vertexai",
] as const;

export type EmbeddingsProviderName = (typeof EMBEDDINGS_PROVIDERS)[number];

/** Providers that embed queries and documents differently look at this; the rest ignore it. */
export type EmbedPurpose = "document" | "query";

/**
 * One bound implementation per process; `embed` returns vectors in input order.
 * `name` is free-form so adapters outside the configured set can plug in.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;
  embed(texts: string[], signal?: AbortSignal, purpose?: EmbedPurpose): Promise<number[][]>;
}

export interface EmbeddingsConfig {
  provider: EmbeddingsProviderName;
  model: string;
  /** Texts per provider call. */
  batchSize: number;
  /** Provider calls in flight at once. */
  maxConcurrency: number;
  timeoutMs: number;
  retry: { attempts: number; baseMs: number };
  openai: { apiKey?: string | undefined; baseUrl?: string | undefined };
  azure: { apiKey?: string | undefined; endpoint?: string | undefined; apiVersion: string; deployment?: string | undefined };
  huggingface: { token?: string | undefined };
  ollama: { baseUrl: string };
  bedrock: { region: string; accessKeyId?: string | undefined; secretAccessKey?: string | undefined };
  vertexai: { apiKey?: string | undefined };
}
