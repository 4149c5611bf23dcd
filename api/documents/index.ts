import express from "express";
import multer from "multer";
import { readFile } from "node:fs/promises";
import { z } from "zod";

import { httpStatusForKind } from "../../src/server/rag/errors.ts";
import { md5Hex, type IngestRequest, type IngestResult } from "../../src/server/rag/ingest/pipeline.ts";
import { createLogger } from "../../src/server/logging.ts";
import { parseBool } from "../config.ts";
import { abortOnDisconnect, bodyOf, firstString, sendError, sendPayload } from "../http.ts";
import type { RagServices } from "../services.ts";
import { sanitizeFilename, UploadRejectedError, validateUploadOrThrow } from "./security/validateUpload.ts";
import { PathTraversalError, resolveUploadDir, safeJoin } from "./storage/paths.ts";

const log = createLogger("api.documents");

const StoreBodySchema = z.object({
  filepath: z.string().trim().min(1, "filepath is required"),
  filename: z.string().trim().min(1).optional(),
  file_content_type: z.string().trim().optional(),
  file_id: z.string().trim().min(1).optional(),
  collection: z.string().trim().min(1).optional(),
});

function statusForResult(result: IngestResult): number {
  if (result.ok) { return 200; }
  if (result.status === "cancelled") { return 499; }
  // Empty extraction carries no error payload: the file was readable but held no text.
  return result.error ? httpStatusForKind(result.error.kind) : 422;
}

function rejectionStatus(error: UploadRejectedError): number {
  return error.reason === "too_large" ? 413 : 400;
}

function hasCode(error: unknown): error is { code: string } {
  return typeof error === "object" && error !== null && "code" in error && typeof error.code === "string";
}

export function createDocumentsRouter(services: RagServices): express.Router {
  const { config, store, jobs } = services;
  const uploadDir = resolveUploadDir(config.uploadDir);
  const collectionOr = (value: unknown): string => firstString(value) ?? config.defaultCollection;

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.upload.maxBytes },
  });

  const router = express.Router();

  async function ingest(
    res: express.Response,
    req: IngestRequest,
    wait: boolean,
  ): Promise<express.Response> {
    const fileId = req.fileId ?? md5Hex(req.buffer);
    if (!wait) {
      const jobId = jobs.submit({ ...req, fileId });
      return res.status(202).json({ ok: true, jobId, fileId, collection: req.collection ?? config.defaultCollection });
    }

    const { jobId, done } = jobs.run({ ...req, fileId, signal: abortOnDisconnect(res) });
    const result = await done;
    return res.status(statusForResult(result)).json({ jobId, ...result });
  }

  // POST /upload (multipart: file, file_id?, collection?, wait?)
  router.post("/upload", upload.single("file"), async (req, res) => {
    try {
      const file = req.file;
      if (!file) {
        return sendPayload(res, 400, { kind: "invalid_query", message: 'Missing multipart file field "file"' });
      }

      const body = bodyOf(req);
      const filename = sanitizeFilename(file.originalname);
      const detected = validateUploadOrThrow({
        originalName: filename,
        mimeType: file.mimetype,
        sizeBytes: file.size,
        maxBytes: config.upload.maxBytes,
        allowedExtensions: config.upload.allowedExtensions,
      });
      const fileId = firstString(body.file_id);

      log.debug("upload received", { filename, sizeBytes: file.size, contentType: detected.mimeType });

      return await ingest(
        res,
        {
          buffer: file.buffer,
          contentType: detected.mimeType,
          filename,
          collection: collectionOr(body.collection),
          ...(fileId ? { fileId } : {}),
        },
        parseBool(firstString(body.wait)) ?? true,
      );
    } catch (error: unknown) {
      if (error instanceof UploadRejectedError) {
        return sendPayload(res, rejectionStatus(error), { kind: "invalid_query", message: error.message });
      }
      log.error("upload failed", { error });
      return sendError(res, error);
    }
  });

  // POST /store: ingest a file already sitting in the upload directory.
  router.post("/store", async (req, res) => {
    const parsed = StoreBodySchema.safeParse(bodyOf(req));
    if (!parsed.success) {
      const details = parsed.error.issues.map((i) => ({ field: i.path.join(".") || "body", message: i.message }));
      return sendPayload(res, 400, {
        kind: "invalid_query",
        message: details.map((d) => `${d.field}: ${d.message}`).join("; "),
        details,
      });
    }
    const body = parsed.data;

    try {
      const fullPath = safeJoin(uploadDir, body.filepath);
      const buffer = await readFile(fullPath);
      const filename = sanitizeFilename(body.filename ?? body.filepath);
      const detected = validateUploadOrThrow({
        originalName: filename,
        ...(body.file_content_type ? { mimeType: body.file_content_type } : {}),
        sizeBytes: buffer.byteLength,
        maxBytes: config.upload.maxBytes,
        allowedExtensions: config.upload.allowedExtensions,
      });

      return await ingest(
        res,
        {
          buffer,
          contentType: detected.mimeType,
          filename,
          collection: body.collection ?? config.defaultCollection,
          ...(body.file_id ? { fileId: body.file_id } : {}),
        },
        true,
      );
    } catch (error: unknown) {
      if (error instanceof PathTraversalError) {
        return sendPayload(res, 400, { kind: "invalid_query", message: error.message });
      }
      if (error instanceof UploadRejectedError) {
        return sendPayload(res, rejectionStatus(error), { kind: "invalid_query", message: error.message });
      }
      if (hasCode(error) && error.code === "ENOENT") {
        return sendPayload(res, 404, { kind: "invalid_query", message: `File not found: ${body.filepath}` });
      }
      log.error("store failed", { error });
      return sendError(res, error);
    }
  });

  router.get("/ids", async (req, res) => {
    const collection = collectionOr(req.query.collection);
    try {
      return res.status(200).json({ ok: true, collection, ids: await store.listFileIds(collection) });
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  router.get("/count", async (req, res) => {
    const collection = collectionOr(req.query.collection);
    try {
      return res.status(200).json({ ok: true, collection, count: await store.count(collection) });
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  router.delete("/documents/:fileId", async (req, res) => {
    const collection = collectionOr(req.query.collection);
    const fileId = req.params.fileId;
    try {
      const deleted = await store.deleteByFileId(collection, fileId);
      if (deleted === 0) {
        return sendPayload(res, 404, { kind: "invalid_query", message: `No chunks for file_id "${fileId}" in ${collection}` });
      }
      log.info("document deleted", { fileId, collection, deleted });
      return res.status(200).json({ ok: true, collection, fileId, deleted });
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  router.get("/stats/:collection", async (req, res) => {
    try {
      const stats = await store.stats(req.params.collection);
      if (!stats) {
        return sendPayload(res, 404, { kind: "invalid_query", message: `Unknown collection: ${req.params.collection}` });
      }
      return res.status(200).json({ ok: true, stats });
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  router.get("/collections", async (_req, res) => {
    try {
      return res.status(200).json({ ok: true, collections: await store.listCollections() });
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  router.delete("/collections/:collection", async (req, res) => {
    const collection = req.params.collection;
    try {
      if (!(await store.dropCollection(collection))) {
        return sendPayload(res, 404, { kind: "invalid_query", message: `Unknown collection: ${collection}` });
      }
      log.info("collection dropped", { collection });
      return res.status(200).json({ ok: true, collection });
    } catch (error: unknown) {
      return sendError(res, error);
    }
  });

  router.get("/ingest/jobs/:jobId", (req, res) => {
    const job = jobs.get(req.params.jobId);
    if (!job) {
      return sendPayload(res, 404, { kind: "invalid_query", message: "Unknown job" });
    }
    return res.status(200).json({ ok: true, job });
  });

  // Multer errors arrive here before the upload handler runs.
  router.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      const message = err.code === "LIMIT_FILE_SIZE" ? `File too large (max ${config.upload.maxBytes} bytes)` : err.message;
      return sendPayload(res, status, { kind: "invalid_query", message });
    }
    return next(err);
  });

  return router;
}
