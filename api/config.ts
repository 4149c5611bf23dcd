import { z } from "zod";

import { ConfigError } from "../src/server/rag/errors.ts";
import { EMBEDDINGS_PROVIDERS, type EmbeddingsConfig, type EmbeddingsProviderName } from "../src/server/rag/embeddings/types.ts";
import { SOURCE_EXTENSIONS } from "../src/server/rag/extract/index.ts";

export type Env = Record<string, string | undefined>;

export const DEFAULT_MODELS: Record<EmbeddingsProviderName, string> = {
  openai: "text-embedding-3-small",
  azure: "text-embedding-3-small",
  huggingface: "sentence-transformers/all-MiniLM-L6-v2",
  huggingfacetei: "http://huggingfacetei:3000",
  ollama: "nomic-embed-text",
  bedrock: "amazon.titan-embed-text-v1",
  vertexai: "text-embedding-004",
};

export const DEFAULT_ALLOWED_EXTS: readonly string[] = [
  "pdf",
  "txt",
  "md",
  "csv",
  "json",
  "docx",
  "xlsx",
  "pptx",
  ...SOURCE_EXTENSIONS,
];

export interface AppConfig {
  host: string;
  port: number;
  uploadDir: string;
  dbPath: string;
  defaultCollection: string;
  chunk: { size: number; overlap: number };
  embeddings: EmbeddingsConfig;
  retry: { attempts: number; baseMs: number };
  agent: {
    maxSteps: number;
    policy: "rules" | "ollama";
    synthesis: "extractive" | "ollama";
    defaultTopK: number;
  };
  ollama: { baseUrl: string; chatModel: string; timeoutMs: number };
  upload: { maxBytes: number; allowedExtensions: string[] };
  health: { embeddingsProbeTtlMs: number };
}

const TRUTHY = ["1", "true", "yes", "y", "t", "on"];
const FALSY = ["0", "false", "no", "n", "f", "off"];

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

function intVar(fallback: number, min: number) {
  return z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v.trim() === "") { return fallback; }
      const n = Number(v);
      if (!Number.isInteger(n) || n < min) {
        ctx.addIssue({ code: "custom", message: `must be an integer >= ${min} (got "${v}")` });
        return z.NEVER;
      }
      return n;
    });
}

function stringVar(fallback: string) {
  return optionalString.transform((v) => v ?? fallback);
}

function enumVar<const T extends readonly [string, ...string[]]>(values: T, fallback: T[number]) {
  return optionalString.pipe(z.enum(values).optional()).transform((v) => v ?? fallback);
}

export function parseBool(value: string | undefined): boolean | null {
  if (value == null) { return null; }
  const v = value.trim().toLowerCase();
  if (TRUTHY.includes(v)) { return true; }
  if (FALSY.includes(v)) { return false; }
  return null;
}

const EnvSchema = z.object({
  RAG_HOST: stringVar("0.0.0.0"),
  RAG_PORT: intVar(8000, 1),
  RAG_UPLOAD_DIR: stringVar("./uploads/"),
  RAG_DB_PATH: stringVar("data/rag.sqlite"),
  RAG_COLLECTION_NAME: stringVar("Documents"),
  CHUNK_SIZE: intVar(1500, 1),
  CHUNK_OVERLAP: intVar(100, 0),
  EMBEDDINGS_PROVIDER: enumVar(EMBEDDINGS_PROVIDERS, "openai"),
  EMBEDDINGS_MODEL: optionalString,
  EMBEDDINGS_CHUNK_SIZE: intVar(0, 1),
  EMBEDDINGS_MAX_CONCURRENCY: intVar(2, 1),
  EMBEDDINGS_TIMEOUT_MS: intVar(30_000, 1),
  RAG_RETRY_ATTEMPTS: intVar(3, 1),
  RAG_RETRY_BASE_MS: intVar(250, 0),
  AGENT_MAX_STEPS: intVar(6, 1),
  AGENT_POLICY: enumVar(["rules", "ollama"] as const, "rules"),
  AGENT_SYNTHESIS: enumVar(["extractive", "ollama"] as const, "extractive"),
  RAG_DEFAULT_TOP_K: intVar(4, 1),
  OLLAMA_BASE_URL: stringVar("http://ollama:11434"),
  OLLAMA_CHAT_MODEL: stringVar("llama3.1"),
  OLLAMA_TIMEOUT_MS: intVar(60_000, 1),
  UPLOAD_MAX_BYTES: intVar(10 * 1024 * 1024, 1),
  UPLOAD_ALLOWED_EXTS: optionalString,
  HEALTH_EMBEDDINGS_TTL_MS: intVar(30_000, 0),
  RAG_OPENAI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  RAG_OPENAI_BASEURL: optionalString,
  RAG_AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_API_KEY: optionalString,
  RAG_AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_ENDPOINT: optionalString,
  RAG_AZURE_OPENAI_API_VERSION: stringVar("2023-05-15"),
  AZURE_OPENAI_DEPLOYMENT: optionalString,
  HF_TOKEN: optionalString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_DEFAULT_REGION: stringVar("us-east-1"),
  GOOGLE_API_KEY: optionalString,
});

function parseExtensions(raw: string | undefined): string[] {
  if (!raw) { return [...DEFAULT_ALLOWED_EXTS]; }
  const exts = raw
    .split(",")
    .map((s) => s.trim().toLowerCase().replace(/^\./, ""))
    .filter(Boolean);
  return exts.length ? exts : [...DEFAULT_ALLOWED_EXTS];
}

/** Reads and validates every setting at once; all problems are reported together. */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => ({ field: i.path.join(".") || "env", message: i.message }));
    throw new ConfigError(`Invalid configuration: ${details.map((d) => `${d.field} ${d.message}`).join("; ")}`, details);
  }

  const e = parsed.data;
  if (e.CHUNK_OVERLAP >= e.CHUNK_SIZE) {
    const details = [{ field: "CHUNK_OVERLAP", message: `must be smaller than CHUNK_SIZE (${e.CHUNK_SIZE})` }];
    throw new ConfigError(`Invalid configuration: CHUNK_OVERLAP ${details[0]?.message}`, details);
  }

  const provider = e.EMBEDDINGS_PROVIDER;
  const batchDefault = provider === "openai" || provider === "azure" ? 200 : 32;
  const retry = { attempts: e.RAG_RETRY_ATTEMPTS, baseMs: e.RAG_RETRY_BASE_MS };

  return {
    host: e.RAG_HOST,
    port: e.RAG_PORT,
    uploadDir: e.RAG_UPLOAD_DIR,
    dbPath: e.RAG_DB_PATH,
    defaultCollection: e.RAG_COLLECTION_NAME,
    chunk: { size: e.CHUNK_SIZE, overlap: e.CHUNK_OVERLAP },
    embeddings: {
      provider,
      model: e.EMBEDDINGS_MODEL ?? DEFAULT_MODELS[provider],
      batchSize: e.EMBEDDINGS_CHUNK_SIZE || batchDefault,
      maxConcurrency: e.EMBEDDINGS_MAX_CONCURRENCY,
      timeoutMs: e.EMBEDDINGS_TIMEOUT_MS,
      retry,
      openai: { apiKey: e.RAG_OPENAI_API_KEY ?? e.OPENAI_API_KEY, baseUrl: e.RAG_OPENAI_BASEURL },
      azure: {
        apiKey: e.RAG_AZURE_OPENAI_API_KEY ?? e.AZURE_OPENAI_API_KEY,
        endpoint: e.RAG_AZURE_OPENAI_ENDPOINT ?? e.AZURE_OPENAI_ENDPOINT,
        apiVersion: e.RAG_AZURE_OPENAI_API_VERSION,
        deployment: e.AZURE_OPENAI_DEPLOYMENT,
      },
      huggingface: { token: e.HF_TOKEN },
      ollama: { baseUrl: e.OLLAMA_BASE_URL },
      bedrock: { region: e.AWS_DEFAULT_REGION, accessKeyId: e.AWS_ACCESS_KEY_ID, secretAccessKey: e.AWS_SECRET_ACCESS_KEY },
      vertexai: { apiKey: e.GOOGLE_API_KEY },
    },
    retry,
    agent: {
      maxSteps: e.AGENT_MAX_STEPS,
      policy: e.AGENT_POLICY,
      synthesis: e.AGENT_SYNTHESIS,
      defaultTopK: e.RAG_DEFAULT_TOP_K,
    },
    ollama: { baseUrl: e.OLLAMA_BASE_URL, chatModel: e.OLLAMA_CHAT_MODEL, timeoutMs: e.OLLAMA_TIMEOUT_MS },
    upload: { maxBytes: e.UPLOAD_MAX_BYTES, allowedExtensions: parseExtensions(e.UPLOAD_ALLOWED_EXTS) },
    health: { embeddingsProbeTtlMs: e.HEALTH_EMBEDDINGS_TTL_MS },
  };
}
