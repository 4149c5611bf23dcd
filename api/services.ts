import { AgenticEngine } from "../src/server/rag/agent/engine.ts";
import { OllamaToolPolicy } from "../src/server/rag/agent/policy.ollama.ts";
import { RuleBasedPolicy } from "../src/server/rag/agent/policy.rules.ts";
import { ExtractiveSynthesizer, OllamaSynthesizer } from "../src/server/rag/agent/synthesizer.ts";
import { createToolRegistry } from "../src/server/rag/agent/tools.ts";
import type { RegisteredTool } from "../src/server/rag/agent/types.ts";
import { createEmbeddingGateway, type EmbeddingGateway, type EmbeddingProvider } from "../src/server/rag/embeddings/index.ts";
import { IngestJobRegistry } from "../src/server/rag/ingest/jobs.ts";
import { IngestionPipeline } from "../src/server/rag/ingest/pipeline.ts";
import { OllamaClient } from "../src/server/rag/llm/ollama.ts";
import { QueryRouter } from "../src/server/rag/query/router.ts";
import { SqliteVectorStore } from "../src/server/rag/vectorStore/sqlite.ts";
import type { VectorStoreGateway } from "../src/server/rag/vectorStore/types.ts";
import type { AppConfig } from "./config.ts";

/** Long-lived collaborators, built once per process and handed to the routers. */
export interface RagServices {
  config: AppConfig;
  store: VectorStoreGateway;
  embeddings: EmbeddingGateway;
  pipeline: IngestionPipeline;
  jobs: IngestJobRegistry;
  agent: AgenticEngine;
  router: QueryRouter;
  close(): void;
}

export interface CreateServicesOverrides {
  store?: VectorStoreGateway;
  provider?: EmbeddingProvider;
  tools?: RegisteredTool[];
}

export function createServices(config: AppConfig, overrides: CreateServicesOverrides = {}): RagServices {
  let sqlite: SqliteVectorStore | null = null;
  let store: VectorStoreGateway;
  if (overrides.store) {
    store = overrides.store;
  } else {
    sqlite = SqliteVectorStore.open(config.dbPath);
    store = sqlite;
  }
  const embeddings = createEmbeddingGateway(config.embeddings, overrides.provider);

  const pipeline = new IngestionPipeline({
    store,
    embeddings,
    chunk: config.chunk,
    defaultCollection: config.defaultCollection,
    retry: config.retry,
  });

  const llm = new OllamaClient({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.chatModel,
    timeoutMs: config.ollama.timeoutMs,
  });
  const rules = new RuleBasedPolicy();
  const extractive = new ExtractiveSynthesizer();

  const agent = new AgenticEngine(
    {
      tools: createToolRegistry(overrides.tools),
      policy: config.agent.policy === "ollama" ? new OllamaToolPolicy(llm, rules) : rules,
      synthesizer: config.agent.synthesis === "ollama" ? new OllamaSynthesizer(llm, extractive) : extractive,
      maxSteps: config.agent.maxSteps,
    },
    { store, embeddings, retry: config.retry },
  );

  return {
    config,
    store,
    embeddings,
    pipeline,
    jobs: new IngestJobRegistry(pipeline),
    agent,
    router: new QueryRouter({ store, embeddings, retry: config.retry, agent }),
    close() {
      // Only close what was opened here; an injected store belongs to the caller.
      sqlite?.close();
    },
  };
}
