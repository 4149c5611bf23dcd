import { createHash } from 'node:crypto'

import {
  ConfigError,
  EmbeddingProviderError,
  RagError,
  toErrorPayload,
  type IngestStage,
  type RagErrorPayload,
} from '../errors.ts'
import { KeyedSerialQueue } from '../concurrency.ts'
import { extractDocument, type ExtractedDocument, type ExtractInput } from '../extract/index.ts'
import { isAbortError, withRetry } from '../retry.ts'
import { pageAt } from '../text/pages.ts'
import { assertChunkOptions, chunkText, type ChunkOptions } from '../text/chunk.ts'
import type { ChunkMetadata, ChunkRecord, VectorStoreGateway } from '../vectorStore/types.ts'
import { createLogger } from '../../logging.ts'

function chunkOptionsOrThrow(opts: ChunkOptions): ChunkOptions {
  try {
    return assertChunkOptions(opts)
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`invalid chunk options: ${message}`, [{ field: 'chunk', message }])
  }
}

export interface IngestRequest {
  /** Defaults to the MD5 hex of `buffer`. */
  fileId?: string
  buffer: Buffer
  contentType: string
  filename?: string
  collection?: string
  /** ISO timestamp; defaults to now. */
  uploadedAt?: string
  chunk?: ChunkOptions
  signal?: AbortSignal
}

interface IngestResultBase {
  fileId: string
  collection: string
  /** Every state the document passed through, in order. */
  stages: IngestStage[]
  /** Chunks removed by the replace step before new ones were written. */
  deletedCount: number
  startedAt: string
  finishedAt: string
}

export interface IngestCompleted extends IngestResultBase {
  ok: true
  status: 'complete'
  stage: 'complete'
  chunkCount: number
  isLikelyScanned?: boolean
}

export interface IngestFailed extends IngestResultBase {
  ok: false
  status: 'failed' | 'cancelled'
  /** The state the pipeline was trying to reach. */
  stage: IngestStage
  chunkCount: 0
  reason: string
  error?: RagErrorPayload
}

export type IngestResult = IngestCompleted | IngestFailed

export interface IngestionPipelineDeps {
  store: VectorStoreGateway
  embeddings: { embed(texts: string[], signal?: AbortSignal): Promise<number[][]> }
  chunk: ChunkOptions
  defaultCollection: string
  retry: { attempts: number; baseMs: number }
  extract?: (input: ExtractInput) => Promise<ExtractedDocument>
}

export const EMPTY_CONTENT = 'empty-content'

const log = createLogger('rag.ingest')

export function md5Hex(buffer: Buffer): string {
  return createHash('md5').update(buffer).digest('hex')
}

class Cancelled extends Error {
  constructor() {
    super('cancelled')
    this.name = 'AbortError'
  }
}

/**
 * extract -> chunk -> embed -> upsert for one file. Existing chunks for the file
 * are deleted first so a re-upload replaces rather than appends. All vectors are
 * buffered and written with a single upsert, so a failed or cancelled run never
 * leaves part of the new content behind.
 */
export class IngestionPipeline {
  private readonly deps: IngestionPipelineDeps
  private readonly extract: (input: ExtractInput) => Promise<ExtractedDocument>
  private readonly serial = new KeyedSerialQueue()

  constructor(deps: IngestionPipelineDeps) {
    assertChunkOptions(deps.chunk)
    this.deps = deps
    this.extract = deps.extract ?? extractDocument
  }

  get defaultCollection(): string {
    return this.deps.defaultCollection
  }

  /** Ingestions of the same (collection, fileId) run one after another, in call order. */
  ingest(req: IngestRequest): Promise<IngestResult> {
    const fileId = String(req.fileId ?? '').trim() || md5Hex(req.buffer)
    const collection = String(req.collection ?? '').trim() || this.deps.defaultCollection
    return this.serial.run(`${collection}\u0000${fileId}`, () => this.runOnce(req, fileId, collection))
  }

  private async runOnce(req: IngestRequest, fileId: string, collection: string): Promise<IngestResult> {
    const startedAt = new Date().toISOString()
    const stages: IngestStage[] = ['received']
    let target: IngestStage = 'received'
    let deletedCount = 0

    const { store, embeddings, retry } = this.deps
    const signal = req.signal
    const retryOpts = { ...retry, ...(signal ? { signal } : {}) }

    const checkpoint = (): void => {
      if (signal?.aborted) throw new Cancelled()
    }

    const fail = (status: 'failed' | 'cancelled', reason: string, error?: RagErrorPayload): IngestFailed => ({
      ok: false,
      status,
      stage: target,
      chunkCount: 0,
      reason,
      fileId,
      collection,
      stages,
      deletedCount,
      startedAt,
      finishedAt: new Date().toISOString(),
      ...(error ? { error } : {}),
    })

    log.info('ingest started', { fileId, collection, byteSize: req.buffer.byteLength, contentType: req.contentType })

    try {
      // Bad chunk options fail before anything already stored is touched.
      const chunkOpts = chunkOptionsOrThrow(req.chunk ?? this.deps.chunk)
      checkpoint()
      deletedCount = await withRetry(() => store.deleteByFileId(collection, fileId), retryOpts)

      target = 'extracted'
      checkpoint()
      const doc = await this.extract({
        buffer: req.buffer,
        contentType: req.contentType,
        ...(req.filename ? { filename: req.filename } : {}),
      })
      if (!doc.text.trim()) {
        log.warn('extraction produced no text; document left empty', { fileId, collection, deletedCount })
        return fail('failed', EMPTY_CONTENT)
      }
      stages.push('extracted')

      target = 'chunked'
      checkpoint()
      const spans = chunkText(doc.text, chunkOpts)
      if (spans.length === 0) {
        return fail('failed', EMPTY_CONTENT)
      }
      stages.push('chunked')

      target = 'embedded'
      checkpoint()
      const vectors = await embeddings.embed(spans.map((s) => s.text), signal)
      if (vectors.length !== spans.length) {
        throw new EmbeddingProviderError(`expected ${spans.length} vectors, got ${vectors.length}`)
      }
      stages.push('embedded')

      target = 'stored'
      checkpoint()
      const uploadedAt = req.uploadedAt ?? startedAt
      const records: ChunkRecord[] = spans.map((span, i) => {
        const metadata: ChunkMetadata = {
          filename: req.filename ?? fileId,
          content_type: req.contentType,
          uploaded_at: uploadedAt,
          byte_size: req.buffer.byteLength,
          char_start: span.charStart,
          char_end: span.charEnd,
          total_chunks: spans.length,
        }
        const page = doc.pages ? pageAt(doc.pages, span.charStart) : undefined
        if (page !== undefined) metadata.page = page

        return { fileId, chunkIndex: span.chunkIndex, text: span.text, embedding: vectors[i] ?? [], metadata }
      })
      // Past this point the write runs to completion even if the caller cancels.
      await withRetry(() => store.upsert(collection, records), retry)
      stages.push('stored')

      target = 'complete'
      stages.push('complete')
      log.info('ingest complete', { fileId, collection, chunkCount: records.length, deletedCount })

      return {
        ok: true,
        status: 'complete',
        stage: 'complete',
        chunkCount: records.length,
        fileId,
        collection,
        stages,
        deletedCount,
        startedAt,
        finishedAt: new Date().toISOString(),
        ...(doc.isLikelyScanned !== undefined ? { isLikelyScanned: doc.isLikelyScanned } : {}),
      }
    } catch (error: unknown) {
      if (error instanceof Cancelled || isAbortError(error)) {
        log.info('ingest cancelled', { fileId, collection, stage: target })
        return fail('cancelled', 'cancelled')
      }

      if (error instanceof RagError) error.withContext({ stage: target, fileId, collection })
      const payload = toErrorPayload(error, { stage: target, fileId, collection })
      log.error('ingest failed', { fileId, collection, stage: target, kind: payload.kind, error })
      return fail('failed', payload.message, payload)
    }
  }
}
