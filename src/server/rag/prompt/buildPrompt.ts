import type { Evidence } from "../agent/types.ts";

function oneLine(input: string): string {
  return String(input || "")
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

/** `[source: <file_id>#<chunk_index> p.<page>]`, page only when known. */
export function sourceTag(e: Pick<Evidence, "fileId" | "chunkIndex" | "metadata">): string {
  const page = typeof e.metadata.page === "number" ? ` p.${e.metadata.page}` : "";
  return `[source: ${oneLine(e.fileId)}#${e.chunkIndex}${page}]`;
}

export function buildAnswerPrompt(input: { question: string; evidence: Evidence[]; facts: string[]; maxCharsPerPassage?: number }): string {
  const question = oneLine(input.question);
  const maxChars = input.maxCharsPerPassage ?? 1200;

  const contextLines = input.evidence.map((e, i) => `${i + 1}) ${sourceTag(e)} ${oneLine(e.text).slice(0, maxChars)}`);
  const factLines = input.facts.map((f) => `- ${oneLine(f)}`);

  return (
    `Answer ONLY using the facts and context passages below, taken from the user's indexed documents.\n` +
    `Do not use outside knowledge. Do not guess. If the context is not enough, say so.\n` +
    `Cite every statement taken from a passage with its source tag, e.g. [source: report.pdf#3].\n` +
    `Use only source tags that appear below.\n` +
    `\n` +
    `Question: ${question}\n` +
    `\n` +
    `Facts:\n` +
    (factLines.length ? factLines.join("\n") : "(none)") +
    `\n\n` +
    `Context:\n` +
    (contextLines.length ? contextLines.join("\n") : "(no passages were retrieved)") +
    `\n\n` +
    `Answer:`
  );
}
