import type express from "express";

import { createApp } from "../../app.ts";
import { createServices, type RagServices } from "../../services.ts";
import type { EmbeddingProvider } from "../../../src/server/rag/embeddings/types.ts";
import { createFakeProvider, testConfig } from "./fakes.ts";

export interface TestApp {
  app: express.Express;
  services: RagServices;
}

/** App over an in-memory store and the keyword embedding fake. Call `services.close()` when done. */
export function buildTestApp(env: Record<string, string> = {}, provider: EmbeddingProvider = createFakeProvider()): TestApp {
  const services = createServices(testConfig(env), { provider });
  return { app: createApp({ services }), services };
}
