import express from "express";
import cors from "cors";

import { createLogger } from "../src/server/logging.ts";
import { loadConfig, type AppConfig } from "./config.ts";
import { createDocumentsRouter } from "./documents/index.ts";
import { createHealthHandler } from "./health.ts";
import { sendError } from "./http.ts";
import { requestLog } from "./logging/requestLog.ts";
import { createQueryRouter } from "./query/index.ts";
import { createServices, type RagServices } from "./services.ts";

const log = createLogger("api");

export interface CreateAppOptions {
  config?: AppConfig;
  services?: RagServices;
}

export function createApp(opts: CreateAppOptions = {}): express.Express {
  const services = opts.services ?? createServices(opts.config ?? loadConfig());
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));
  app.use(requestLog());

  app.get("/health", createHealthHandler(services));

  // Query endpoints (semantic + agentic)
  app.use("/query", createQueryRouter(services));

  // Upload, store and collection management
  app.use("/", createDocumentsRouter(services));

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ ok: false, error: { kind: "invalid_query", message: "Malformed JSON body" } });
    }
    log.error("unhandled request error", { error: err });
    return sendError(res, err, 500);
  });

  return app;
}
