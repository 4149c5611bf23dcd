import type express from "express";

import { isRecord } from "../src/server/rag/json.ts";
import { httpStatusForKind, toErrorPayload, type RagErrorPayload } from "../src/server/rag/errors.ts";


export function bodyOf(req: express.Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

export function firstString(value: unknown): string | undefined {
  const v = Array.isArray(value) ? value[0] : value;
  if (typeof v !== "string") { return undefined; }
  return v.trim() || undefined;
}

export function sendError(res: express.Response, error: unknown, status?: number): express.Response {
  const payload = toErrorPayload(error);
  return res.status(status ?? httpStatusForKind(payload.kind)).json({ ok: false, error: payload });
}

export function sendPayload(res: express.Response, status: number, error: RagErrorPayload): express.Response {
  return res.status(status).json({ ok: false, error });
}

/** Aborts when the client goes away before the response was written. */
export function abortOnDisconnect(res: express.Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) { controller.abort(); }
  });
  return controller.signal;
}
