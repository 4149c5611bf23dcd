import { randomUUID } from "node:crypto";

import { toErrorPayload, type RagErrorPayload } from "../errors.ts";
import { createLogger } from "../../logging.ts";
import type { IngestionPipeline, IngestRequest, IngestResult } from "./pipeline.ts";

export type IngestJobState = "queued" | "running" | "done" | "failed";

export interface IngestJobStatus {
  jobId: string;
  state: IngestJobState;
  fileId?: string;
  collection: string;
  queuedAt: string;
  startedAt?: string;
  finishedAt?: string;
  result?: IngestResult;
  error?: RagErrorPayload;
}

const log = createLogger("rag.ingest.jobs");

/**
 * In-memory registry of ingestion jobs. Jobs start immediately; the pipeline's
 * per-file serialization decides when they actually run.
 */
export class IngestJobRegistry {
  private readonly jobs = new Map<string, IngestJobStatus>();
  private readonly maxJobs: number;
  private readonly pipeline: IngestionPipeline;

  constructor(pipeline: IngestionPipeline, opts: { maxJobs?: number } = {}) {
    this.pipeline = pipeline;
    this.maxJobs = Math.max(1, opts.maxJobs ?? 1000);
  }

  /** Runs the ingestion and resolves with its result; the job is tracked either way. */
  run(req: IngestRequest): { jobId: string; done: Promise<IngestResult> } {
    const jobId = randomUUID();
    const job: IngestJobStatus = {
      jobId,
      state: "queued",
      collection: String(req.collection ?? "").trim() || this.pipeline.defaultCollection,
      queuedAt: new Date().toISOString(),
      ...(req.fileId ? { fileId: req.fileId } : {}),
    };
    this.remember(job);

    const done = Promise.resolve()
      .then(() => {
        job.state = "running";
        job.startedAt = new Date().toISOString();
        return this.pipeline.ingest(req);
      })
      .then(
        (result) => {
          job.state = result.ok ? "done" : "failed";
          job.fileId = result.fileId;
          job.result = result;
          if (!result.ok && result.error) { job.error = result.error; }
          job.finishedAt = new Date().toISOString();
          return result;
        },
        (error: unknown) => {
          job.state = "failed";
          job.error = toErrorPayload(error);
          job.finishedAt = new Date().toISOString();
          throw error;
        },
      );

    return { jobId, done };
  }

  /** Fire-and-forget variant for asynchronous uploads. */
  submit(req: IngestRequest): string {
    const { jobId, done } = this.run(req);
    done.catch((error: unknown) => {
      log.error("background ingestion threw", { jobId, error });
    });
    return jobId;
  }

  get(jobId: string): IngestJobStatus | null {
    const id = String(jobId || "").trim();
    return (id && this.jobs.get(id)) || null;
  }

  private remember(job: IngestJobStatus): void {
    this.jobs.set(job.jobId, job);
    // Oldest finished jobs go first once the registry is full.
    for (const [id, existing] of this.jobs) {
      if (this.jobs.size <= this.maxJobs) { break; }
      if (existing.state === "done" || existing.state === "failed") { this.jobs.delete(id); }
    }
  }
}
