import express from "express";

import { httpStatusForKind } from "../../src/server/rag/errors.ts";
import { abortOnDisconnect, bodyOf } from "../http.ts";
import type { RagServices } from "../services.ts";

/**
 * Fills in what the HTTP surface defaults (collections, topK) and leaves every
 * other check to the query router, so bad values still come back as 400s.
 */
function withDefaults(body: Record<string, unknown>, services: RagServices): Record<string, unknown> {
  return {
    ...body,
    collections: body.collections ?? [services.config.defaultCollection],
    topK: body.topK ?? services.config.agent.defaultTopK,
  };
}

export function createQueryRouter(services: RagServices): express.Router {
  const router = express.Router();

  async function answer(res: express.Response, input: Record<string, unknown>): Promise<express.Response> {
    const outcome = await services.router.query(input, { signal: abortOnDisconnect(res) });
    if (outcome.ok) {
      return res.status(200).json(outcome.response);
    }
    return res.status(httpStatusForKind(outcome.error.kind)).json({
      ok: false,
      error: outcome.error,
      ...(outcome.reasoning_trace ? { reasoning_trace: outcome.reasoning_trace } : {}),
    });
  }

  // POST /query { query, mode?, collections?, topK? }
  router.post("/", async (req, res) => answer(res, withDefaults(bodyOf(req), services)));

  // POST /query/agentic { query, collection_names?, topK? }
  router.post("/agentic", async (req, res) => {
    const { collection_names: collectionNames, ...rest } = bodyOf(req);
    return answer(res, withDefaults({ ...rest, mode: "agentic", collections: collectionNames }, services));
  });

  return router;
}
