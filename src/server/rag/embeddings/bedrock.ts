import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  InvokeModelCommand,
} from "@aws-sdk/client-bedrock-runtime";

import { EmbeddingProviderError } from "../errors.ts";
import { field } from "../json.ts";
import { isAbortError } from "../retry.ts";
import { assertVectors, isRetryableStatus } from "./http.ts";
import type { EmbeddingProvider, EmbeddingsConfig } from "./types.ts";

const RETRYABLE_NAMES = new Set(["ThrottlingException", "ServiceUnavailableException", "ModelNotReadyException", "InternalServerException", "ModelTimeoutException"]);

function toProviderError(error: unknown): unknown {
  if (isAbortError(error) || error instanceof EmbeddingProviderError) { return error; }

  const name = error instanceof Error ? error.name : "";
  const message = error instanceof Error ? error.message : String(error ?? "unknown error");
  const status = error instanceof BedrockRuntimeServiceException ? (error.$metadata.httpStatusCode ?? 0) : 0;

  return new EmbeddingProviderError(`bedrock embeddings request failed (${name || "error"}): ${message}`, {
    status,
    retryable: RETRYABLE_NAMES.has(name) || (status > 0 && isRetryableStatus(status)),
    cause: error,
  });
}

/** Titan text embeddings take one input per call. */
export function createBedrockEmbeddings(cfg: Pick<EmbeddingsConfig, "model" | "bedrock">): EmbeddingProvider {
  const { region, accessKeyId, secretAccessKey } = cfg.bedrock;
  const client = new BedrockRuntimeClient({
    region,
    ...(accessKeyId && secretAccessKey ? { credentials: { accessKeyId, secretAccessKey } } : {}),
  });

  return {
    name: "bedrock",
    model: cfg.model,
    async embed(texts, signal) {
      const vectors: unknown[] = [];
      for (const inputText of texts) {
        try {
          const out = await client.send(
            new InvokeModelCommand({
              modelId: cfg.model,
              contentType: "application/json",
              accept: "application/json",
              body: JSON.stringify({ inputText }),
            }),
            signal ? { abortSignal: signal } : {},
          );
          const parsed: unknown = JSON.parse(new TextDecoder().decode(out.body));
          vectors.push(field(parsed, "embedding"));
        } catch (error: unknown) {
          throw toProviderError(error);
        }
      }
      return assertVectors(vectors, texts.length, "bedrock");
    },
  };
}
