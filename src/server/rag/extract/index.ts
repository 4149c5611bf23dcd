import path from "node:path";
import mammoth from "mammoth";
import { parseOfficeAsync } from "officeparser";

import { ExtractionError } from "../errors.ts";
import { normalizeText } from "../text/normalize.ts";
import { joinPages, type PageSpan } from "../text/pages.ts";
import { createLogger } from "../../logging.ts";
import { extractTextFromPdf } from "./pdf.ts";
import sourceExtensions from "./sourceExtensions.json";

export type DocumentKind = "pdf" | "docx" | "pptx" | "xlsx" | "markdown" | "text" | "csv" | "json" | "source";

export interface ExtractInput {
  buffer: Buffer;
  contentType: string;
  filename?: string;
}

export interface ExtractedDocument {
  kind: DocumentKind;
  text: string;
  /** Present for paginated formats. Offsets index into `text`. */
  pages?: PageSpan[];
  isLikelyScanned?: boolean;
}

const log = createLogger("rag.extract");

export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set(sourceExtensions);

const KIND_BY_MIME: Record<string, DocumentKind> = {
  "application/pdf": "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation": "pptx",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "text/markdown": "markdown",
  "text/x-markdown": "markdown",
  "text/plain": "text",
  "text/csv": "csv",
  "application/json": "json",
};

const KIND_BY_EXT: Record<string, DocumentKind> = {
  pdf: "pdf",
  docx: "docx",
  pptx: "pptx",
  xlsx: "xlsx",
  md: "markdown",
  markdown: "markdown",
  txt: "text",
  csv: "csv",
  json: "json",
};

function extensionOf(filename: string | undefined): string {
  const base = path.basename(String(filename || "")).toLowerCase();
  if (base === "dockerfile") { return "dockerfile"; }
  return path.extname(base).replace(".", "");
}

/** Content type wins when it is specific; otherwise fall back to the file extension. */
export function resolveDocumentKind(contentType: string, filename?: string): DocumentKind | null {
  const mime = String(contentType || "").split(";")[0]?.trim().toLowerCase() ?? "";
  const byMime = KIND_BY_MIME[mime];
  if (byMime) { return byMime; }

  const ext = extensionOf(filename);
  const byExt = KIND_BY_EXT[ext];
  if (byExt) { return byExt; }
  if (SOURCE_EXTENSIONS.has(ext)) { return "source"; }

  if (mime.startsWith("text/")) { return "text"; }
  return null;
}

function decodeUtf8(buffer: Buffer): string {
  return new TextDecoder("utf-8", { fatal: false }).decode(buffer).replace(/^\uFEFF/, "");
}

async function extractOffice(kind: "docx" | "pptx" | "xlsx", buffer: Buffer): Promise<string> {
  try {
    if (kind === "docx") {
      const result = await mammoth.extractRawText({ buffer });
      return result.value;
    }
    return await parseOfficeAsync(buffer);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error ?? "unknown error");
    throw new ExtractionError(`Failed to read ${kind.toUpperCase()} document: ${message}`, { cause: error });
  }
}

export async function extractDocument(input: ExtractInput): Promise<ExtractedDocument> {
  const kind = resolveDocumentKind(input.contentType, input.filename);
  log.debug("extract_branch", { contentType: input.contentType, kind, byteSize: input.buffer.byteLength });

  if (!kind) {
    throw new ExtractionError(`Unsupported content type: ${input.contentType || "unknown"}`);
  }

  switch (kind) {
    case "pdf": {
      const out = await extractTextFromPdf(input.buffer);
      const joined = joinPages(out.pages);
      return { kind, text: joined.text, pages: joined.spans, isLikelyScanned: out.isLikelyScanned };
    }
    case "docx":
    case "pptx":
    case "xlsx":
      return { kind, text: normalizeText(await extractOffice(kind, input.buffer)) };
    case "json": {
      const raw = decodeUtf8(input.buffer);
      try {
        return { kind, text: JSON.stringify(JSON.parse(raw), null, 2) };
      } catch {
        // Not valid JSON: index it as written.
        return { kind, text: normalizeText(raw) };
      }
    }
    case "source":
      // Indentation carries meaning in code; keep horizontal whitespace.
      return { kind, text: normalizeText(decodeUtf8(input.buffer), { collapseWhitespace: false }) };
    default:
      return { kind, text: normalizeText(decodeUtf8(input.buffer)) };
  }
}
