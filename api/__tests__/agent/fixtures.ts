import { AgenticEngine } from "../../../src/server/rag/agent/engine.ts";
import { RuleBasedPolicy } from "../../../src/server/rag/agent/policy.rules.ts";
import { ExtractiveSynthesizer } from "../../../src/server/rag/agent/synthesizer.ts";
import { createToolRegistry } from "../../../src/server/rag/agent/tools.ts";
import type { SelectionPolicy, Synthesizer } from "../../../src/server/rag/agent/types.ts";
import type { SqliteVectorStore } from "../../../src/server/rag/vectorStore/sqlite.ts";
import type { VectorStoreGateway } from "../../../src/server/rag/vectorStore/types.ts";
import { FAST_RETRY, createGateway, record } from "../helpers/fakes.ts";

/**
 * docs:
 *   r1#0 "revenue grew in the third quarter"
 *   r1#1 "holiday policy for staff"
 *   c1#0 "contract renewal terms"
 */
export async function seedDocs(store: SqliteVectorStore): Promise<void> {
  await store.upsert("docs", [
    record("r1", 0, "revenue grew in the third quarter"),
    record("r1", 1, "holiday policy for staff"),
    record("c1", 0, "contract renewal terms"),
  ]);
}

export function engineFor(
  store: VectorStoreGateway,
  opts: { policy?: SelectionPolicy; synthesizer?: Synthesizer; maxSteps?: number } = {},
): AgenticEngine {
  return new AgenticEngine(
    {
      tools: createToolRegistry(),
      policy: opts.policy ?? new RuleBasedPolicy(),
      synthesizer: opts.synthesizer ?? new ExtractiveSynthesizer(),
      maxSteps: opts.maxSteps ?? 6,
    },
    { store, embeddings: createGateway(), retry: FAST_RETRY },
  );
}
