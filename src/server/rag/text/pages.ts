import { normalizeText } from "./normalize.ts";

export interface PageText { pageNumber: number; text: string; }

export interface PageSpan { pageNumber: number; start: number; end: number; }

const PAGE_SEPARATOR = "\n\n";

/** Joins normalized page texts and records where each page lands in the result. */
export function joinPages(pages: PageText[]): { text: string; spans: PageSpan[] } {
  let text = "";
  const spans: PageSpan[] = [];

  for (const page of pages) {
    const body = normalizeText(page.text);
    if (!body) { continue; }
    if (text) { text += PAGE_SEPARATOR; }
    const start = text.length;
    text += body;
    spans.push({ pageNumber: page.pageNumber, start, end: text.length });
  }

  return { text, spans };
}

/** Page on which the character at `offset` sits; a separator belongs to the page before it. */
export function pageAt(spans: PageSpan[], offset: number): number | undefined {
  let found: number | undefined;
  for (const span of spans) {
    if (span.start > offset) { break; }
    found = span.pageNumber;
  }
  return found;
}
