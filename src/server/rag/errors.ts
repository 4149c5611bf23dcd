import type { TraceStep } from "./agent/types.ts";

export type RagErrorKind =
  | "extraction_error"
  | "embedding_provider_error"
  | "vector_store_unavailable"
  | "schema_mismatch"
  | "invalid_query"
  | "agentic_execution_error"
  | "config_error";

export type IngestStage = "received" | "extracted" | "chunked" | "embedded" | "stored" | "complete";

export interface RagErrorContext {
  stage?: IngestStage;
  fileId?: string;
  collection?: string;
  step?: number;
}

export interface RagErrorPayload extends RagErrorContext {
  kind: RagErrorKind | "unknown";
  message: string;
  details?: Array<{ field: string; message: string }>;
}

export class RagError extends Error {
  readonly kind: RagErrorKind;
  readonly retryable: boolean;
  context: RagErrorContext;

  constructor(
    kind: RagErrorKind,
    message: string,
    opts: { retryable?: boolean; context?: RagErrorContext; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "RagError";
    this.kind = kind;
    this.retryable = opts.retryable ?? false;
    this.context = { ...(opts.context ?? {}) };
  }

  withContext(context: RagErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

/** Unsupported or corrupt file. Never retried. */
export class ExtractionError extends RagError {
  constructor(message: string, opts: { context?: RagErrorContext; cause?: unknown } = {}) {
    super("extraction_error", message, { ...opts, retryable: false });
    this.name = "ExtractionError";
  }
}

/**
 * Provider failure. `retryable` is true for timeouts, 5xx and rate limiting;
 * auth and quota failures are fatal.
 */
export class EmbeddingProviderError extends RagError {
  readonly status?: number;

  constructor(
    message: string,
    opts: { retryable?: boolean; status?: number; context?: RagErrorContext; cause?: unknown } = {},
  ) {
    super("embedding_provider_error", message, opts);
    this.name = "EmbeddingProviderError";
    if (typeof opts.status === "number") { this.status = opts.status; }
  }
}

export class VectorStoreUnavailableError extends RagError {
  constructor(message: string, opts: { context?: RagErrorContext; cause?: unknown } = {}) {
    super("vector_store_unavailable", message, { ...opts, retryable: true });
    this.name = "VectorStoreUnavailableError";
  }
}

export class SchemaMismatchError extends RagError {
  constructor(message: string, opts: { context?: RagErrorContext; cause?: unknown } = {}) {
    super("schema_mismatch", message, { ...opts, retryable: false });
    this.name = "SchemaMismatchError";
  }
}

export class InvalidQueryError extends RagError {
  readonly details: Array<{ field: string; message: string }>;

  constructor(message: string, details: Array<{ field: string; message: string }> = []) {
    super("invalid_query", message, { retryable: false });
    this.name = "InvalidQueryError";
    this.details = details;
  }
}

export class ConfigError extends RagError {
  readonly details: Array<{ field: string; message: string }>;

  constructor(message: string, details: Array<{ field: string; message: string }> = []) {
    super("config_error", message, { retryable: false });
    this.name = "ConfigError";
    this.details = details;
  }
}

/** Carries whatever part of the reasoning trace was produced before the failure. */
export class AgenticExecutionError extends RagError {
  readonly trace: TraceStep[];

  constructor(message: string, trace: TraceStep[] = [], opts: { context?: RagErrorContext; cause?: unknown } = {}) {
    super("agentic_execution_error", message, { ...opts, retryable: false });
    this.name = "AgenticExecutionError";
    this.trace = trace;
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export function isRetryable(error: unknown): boolean {
  return isRagError(error) && error.retryable;
}

export function toOneLine(input: string): string {
  return String(input || "")
    .replace(/[\r\n\t]+/g, " ")
    .replace(/\s{2,}/g, " ")
    .trim();
}

export function toErrorPayload(error: unknown, context: RagErrorContext = {}): RagErrorPayload {
  if (isRagError(error)) {
    const details =
      error instanceof InvalidQueryError || error instanceof ConfigError ? error.details : undefined;
    return {
      kind: error.kind,
      message: toOneLine(error.message),
      ...context,
      ...error.context,
      ...(details && details.length ? { details } : {}),
    };
  }

  const message = error instanceof Error ? error.message : String(error ?? "unknown error");
  return { kind: "unknown", message: toOneLine(message) || "unknown error", ...context };
}

export function httpStatusForKind(kind: RagErrorPayload["kind"]): number {
  switch (kind) {
    case "invalid_query":
      return 400;
    case "extraction_error":
      return 422;
    case "schema_mismatch":
      return 409;
    case "vector_store_unavailable":
      return 503;
    case "embedding_provider_error":
      return 502;
    default:
      return 500;
  }
}
