import { ExtractionError } from '../errors.ts'
import { field } from '../json.ts'
import type { PageText } from '../text/pages.ts'

export type PdfExtractResult = {
  pages: PageText[]
  isLikelyScanned: boolean
}

type PdfJsPage = { getTextContent: () => Promise<{ items: unknown[] }> }

type PdfJsDocument = { numPages: number; getPage: (n: number) => Promise<PdfJsPage>; destroy?: () => unknown }

type PdfJsModule = {
  getDocument: (src: Record<string, unknown>) => { promise: Promise<PdfJsDocument>; destroy?: () => unknown }
}

function isPdfJsModule(mod: unknown): mod is PdfJsModule {
  return typeof field(mod, 'getDocument') === 'function'
}

function defineGlobal(name: string, value: unknown): void {
  if (Reflect.get(globalThis, name) === undefined) {
    Object.defineProperty(globalThis, name, { configurable: true, enumerable: true, writable: true, value })
  }
}

// The legacy build touches a few DOM globals at import time; text extraction needs none of them to work.
function shimPdfJsGlobalsForNode(): void {
  if (!Object.getOwnPropertyDescriptor(globalThis, 'navigator')) {
    defineGlobal('navigator', {})
  }

  defineGlobal(
    'DOMMatrix',
    class DOMMatrixShim {
      a = 1
      b = 0
      c = 0
      d = 1
      e = 0
      f = 0
    },
  )
  defineGlobal('Path2D', class Path2DShim {})
  defineGlobal('ImageData', class ImageDataShim {})
}

function pageTextFromItems(items: unknown[]): string {
  let out = ''
  for (const item of items) {
    const str = field(item, 'str')
    const hasEOL = field(item, 'hasEOL')
    if (typeof str !== 'string') continue

    out += str
    // pdf.js omits spaces between fragments; normalization collapses the extras.
    out += hasEOL ? '\n' : str ? ' ' : ''
  }
  return out
}

function nonWhitespaceChars(text: string): number {
  return text.replace(/\s+/g, '').length
}

function classifyLikelyScanned(pages: PageText[]): boolean {
  if (pages.length === 0) return true
  const total = pages.reduce((acc, p) => acc + nonWhitespaceChars(p.text), 0)
  if (total < 10) return true
  const nearEmpty = pages.filter((p) => nonWhitespaceChars(p.text) < 3).length
  return nearEmpty / pages.length >= 0.6
}

function describePdfError(error: unknown): string {
  const name = error instanceof Error ? error.name : ''
  const msg = error instanceof Error ? error.message : String(error ?? '')

  if (/PasswordException/i.test(name) || /password|encrypted/i.test(msg)) {
    return 'PDF is encrypted or password-protected and cannot be processed.'
  }
  if (/InvalidPDFException/i.test(name) || /invalid pdf|malformed pdf/i.test(msg)) {
    return 'Invalid or corrupted PDF file.'
  }
  return 'Failed to parse PDF.'
}

export async function extractTextFromPdf(input: Buffer): Promise<PdfExtractResult> {
  shimPdfJsGlobalsForNode()

  const pdfjs: unknown = await import('pdfjs-dist/legacy/build/pdf.mjs')
  if (!isPdfJsModule(pdfjs)) {
    throw new ExtractionError('pdfjs-dist did not expose getDocument')
  }

  // pdf.js takes ownership of the array it is given, so hand it a copy.
  const data = new Uint8Array(input)
  const loadingTask = pdfjs.getDocument({ data, disableWorker: true, isEvalSupported: false, stopAtErrors: false })

  let doc: PdfJsDocument | null = null
  try {
    doc = await loadingTask.promise

    const pages: PageText[] = []
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber)
      const content = await page.getTextContent()
      pages.push({ pageNumber, text: pageTextFromItems(content.items).trim() })
    }

    return { pages, isLikelyScanned: classifyLikelyScanned(pages) }
  } catch (error: unknown) {
    throw new ExtractionError(describePdfError(error), { cause: error })
  } finally {
    await doc?.destroy?.()
    await loadingTask.destroy?.()
  }
}
