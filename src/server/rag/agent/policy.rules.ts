import { isRecord } from "../json.ts";
import type { Decision, PolicyState, SelectionPolicy, TraceStep } from "./types.ts";

const COUNT_INTENT = /\b(how many|count|number of|total (?:number|amount))\b/i;
const PER_FILE_INTENT = /\b(per|each|every|by) (?:file|document|doc)s?\b/i;
const FILE_REFERENCE = /\b[\w][\w.-]*\.(?:pdf|docx|pptx|xlsx|md|txt|csv|json)\b/gi;
const FILE_ID_REFERENCE = /\bfile[_ ]?id[:=\s]+["']?([\w.-]+)["']?/gi;

function attempted(steps: TraceStep[], tool: string, key: Record<string, unknown>): boolean {
  return steps.some((s) => {
    if (s.tool !== tool || !isRecord(s.input)) { return false; }
    const input = s.input;
    return Object.entries(key).every(([k, v]) => JSON.stringify(input[k]) === JSON.stringify(v));
  });
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function referencedFilenames(query: string): string[] {
  return unique([...query.matchAll(FILE_REFERENCE)].map((m) => m[0]));
}

export function referencedFileIds(query: string): string[] {
  return unique([...query.matchAll(FILE_ID_REFERENCE)].flatMap((m) => (m[1] ? [m[1]] : [])));
}

/**
 * Keyword-driven plan: counts for counting questions, direct lookups for files
 * the query names, then one similarity search per collection. Each step is tried
 * at most once, failed or not, so the plan always runs out.
 */
export class RuleBasedPolicy implements SelectionPolicy {
  readonly name = "rules";

  async next(state: PolicyState): Promise<Decision> {
    const available = new Set(state.tools.map((t) => t.name));
    const { steps, query } = state;

    if (available.has("countAggregate") && COUNT_INTENT.test(query)) {
      const groupBy = PER_FILE_INTENT.test(query) ? "file" : "none";
      for (const collection of state.collections) {
        if (!attempted(steps, "countAggregate", { collection })) {
          return {
            kind: "invoke",
            tool: "countAggregate",
            input: { collection, groupBy },
            rationale: "query asks for a count",
          };
        }
      }
    }

    if (available.has("metadataFilterLookup")) {
      const fileIds = referencedFileIds(query);
      if (fileIds.length && !attempted(steps, "metadataFilterLookup", { fileIds })) {
        return {
          kind: "invoke",
          tool: "metadataFilterLookup",
          input: { fileIds, limit: state.topK },
          rationale: "query names file ids",
        };
      }

      for (const filename of referencedFilenames(query)) {
        const metadata = { filename };
        if (!attempted(steps, "metadataFilterLookup", { metadata })) {
          return {
            kind: "invoke",
            tool: "metadataFilterLookup",
            input: { metadata, limit: state.topK },
            rationale: `query names ${filename}`,
          };
        }
      }
    }

    if (available.has("similaritySearch")) {
      for (const collection of state.collections) {
        if (!attempted(steps, "similaritySearch", { collection })) {
          return {
            kind: "invoke",
            tool: "similaritySearch",
            input: { query, collection, topK: state.topK },
            rationale: `search ${collection} for relevant passages`,
          };
        }
      }
    }

    return { kind: "synthesize", rationale: "plan complete" };
  }
}
