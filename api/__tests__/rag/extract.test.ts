import { describe, expect, it } from "vitest";
import { PDFDocument, StandardFonts } from "pdf-lib";

import { ExtractionError } from "../../../src/server/rag/errors.ts";
import { extractDocument, resolveDocumentKind } from "../../../src/server/rag/extract/index.ts";
import { extractTextFromPdf } from "../../../src/server/rag/extract/pdf.ts";

async function makePdf(pageTexts: string[]): Promise<Buffer> {
  const pdfDoc = await PDFDocument.create();
  const font = await pdfDoc.embedFont(StandardFonts.Helvetica);
  for (const text of pageTexts) {
    const page = pdfDoc.addPage();
    if (text) { page.drawText(text, { x: 50, y: 700, font, size: 18 }); }
  }
  return Buffer.from(await pdfDoc.save());
}

describe("extractTextFromPdf", () => {
  it("reads text page by page", async () => {
    const result = await extractTextFromPdf(await makePdf(["Hello PDF", "Second page"]));

    expect(result.pages.map((p) => p.pageNumber)).toEqual([1, 2]);
    expect(result.pages[0]?.text).toContain("Hello");
    expect(result.pages[1]?.text).toContain("Second");
    expect(result.isLikelyScanned).toBe(false);
  });

  it("flags a PDF without a text layer as likely scanned", async () => {
    const result = await extractTextFromPdf(await makePdf(["", ""]));
    expect(result.isLikelyScanned).toBe(true);
  });

  it("rejects bytes that are not a PDF", async () => {
    await expect(extractTextFromPdf(Buffer.from("definitely not a pdf"))).rejects.toBeInstanceOf(ExtractionError);
  });
});

describe("resolveDocumentKind", () => {
  it("prefers a specific content type over the extension", () => {
    expect(resolveDocumentKind("application/pdf", "notes.txt")).toBe("pdf");
    expect(resolveDocumentKind("text/markdown; charset=utf-8", "x")).toBe("markdown");
  });

  it("falls back to the extension", () => {
    expect(resolveDocumentKind("application/octet-stream", "report.DOCX")).toBe("docx");
    expect(resolveDocumentKind("", "main.py")).toBe("source");
    expect(resolveDocumentKind("", "Dockerfile")).toBe("source");
    expect(resolveDocumentKind("text/x-unknown", "blob")).toBe("text");
    expect(resolveDocumentKind("application/octet-stream", "image.png")).toBeNull();
  });
});

describe("extractDocument", () => {
  it("joins PDF pages and records their spans", async () => {
    const doc = await extractDocument({ buffer: await makePdf(["Alpha", "Beta"]), contentType: "application/pdf" });

    expect(doc.kind).toBe("pdf");
    expect(doc.text).toBe("Alpha\n\nBeta");
    expect(doc.pages).toEqual([
      { pageNumber: 1, start: 0, end: 5 },
      { pageNumber: 2, start: 7, end: 11 },
    ]);
  });

  it("normalizes plain text", async () => {
    const doc = await extractDocument({
      buffer: Buffer.from("\uFEFFline  one\r\n\r\n\r\n\tline two  "),
      contentType: "text/plain",
    });
    expect(doc).toEqual({ kind: "text", text: "line one\n\nline two" });
  });

  it("pretty-prints valid JSON and keeps invalid JSON as text", async () => {
    const valid = await extractDocument({ buffer: Buffer.from('{"a":[1,2]}'), contentType: "application/json" });
    expect(valid.text).toBe('{\n  "a": [\n    1,\n    2\n  ]\n}');

    const invalid = await extractDocument({ buffer: Buffer.from("{ broken"), contentType: "application/json" });
    expect(invalid.text).toBe("{ broken");
  });

  it("keeps indentation in source files", async () => {
    const doc = await extractDocument({
      buffer: Buffer.from("def f():\n    return 1\n"),
      contentType: "application/octet-stream",
      filename: "f.py",
    });
    expect(doc).toEqual({ kind: "source", text: "def f():\n    return 1" });
  });

  it("rejects unsupported types", async () => {
    await expect(
      extractDocument({ buffer: Buffer.from([0x89, 0x50]), contentType: "image/png", filename: "a.png" }),
    ).rejects.toThrow("Unsupported content type: image/png");
  });

  it("reports unreadable office files as extraction errors", async () => {
    const error = await extractDocument({
      buffer: Buffer.from("not a zip"),
      contentType: "application/octet-stream",
      filename: "broken.docx",
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error instanceof Error ? error.message : "").toMatch(/^Failed to read DOCX document: /);
  });
});
