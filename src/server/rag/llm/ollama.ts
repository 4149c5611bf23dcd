import { toOneLine } from "../errors.ts";
import { field, isRecord } from "../json.ts";
import { sanitizeBaseUrl } from "../embeddings/http.ts";

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface OllamaToolSpec {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface OllamaToolCall {
  function: { name: string; arguments: unknown };
}

export type OllamaMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; tool_calls?: OllamaToolCall[] }
  | { role: "tool"; content: string; tool_name?: string };

export interface OllamaChatReply {
  content: string;
  toolCalls: OllamaToolCall[];
}

function describeResponseBody(body: unknown): string {
  try {
    return toOneLine(JSON.stringify(body)).slice(0, 500);
  } catch {
    return "";
  }
}

function parseToolCalls(value: unknown): OllamaToolCall[] {
  if (!Array.isArray(value)) { return []; }
  const out: OllamaToolCall[] = [];
  for (const call of value) {
    const fn = field(call, "function");
    const name = field(fn, "name");
    const args = field(fn, "arguments");
    if (typeof name !== "string" || !name) { continue; }
    // Some models send arguments as a JSON string.
    let parsedArgs: unknown = args ?? {};
    if (typeof args === "string") {
      try {
        parsedArgs = JSON.parse(args);
      } catch {
        parsedArgs = {};
      }
    }
    out.push({ function: { name, arguments: parsedArgs } });
  }
  return out;
}

/** Thin client for Ollama's `/api/generate` and `/api/chat`, both non-streaming at temperature 0. */
export class OllamaClient {
  private readonly baseUrl: string;
  readonly model: string;
  private readonly timeoutMs: number;

  constructor(opts: OllamaClientOptions) {
    this.baseUrl = sanitizeBaseUrl(opts.baseUrl);
    this.model = opts.model.trim();
    this.timeoutMs = opts.timeoutMs;
  }

  private async post(path: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<Record<string, unknown>> {
    const abortController = new AbortController();
    const timeout = setTimeout(() => abortController.abort(), this.timeoutMs);
    const onCallerAbort = (): void => abortController.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const resp = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model: this.model, stream: false, options: { temperature: 0 }, ...body }),
        signal: abortController.signal,
      });

      const json: unknown = await resp.json().catch(() => null);
      if (!resp.ok) {
        const suffix = json ? ` body=${describeResponseBody(json)}` : "";
        throw new Error(`Ollama ${path} failed (HTTP ${resp.status}) for model "${this.model}".${suffix}`);
      }
      if (!isRecord(json)) {
        throw new Error(`Ollama ${path} returned no JSON body for model "${this.model}"`);
      }
      return json;
    } catch (error: unknown) {
      if (signal?.aborted) { throw error; }
      if (abortController.signal.aborted) {
        throw new Error(`Ollama ${path} timed out after ${this.timeoutMs}ms (model "${this.model}")`);
      }
      if (error instanceof Error) { throw error; }
      throw new Error(`Ollama ${path} failed: ${String(error ?? "unknown error")}`);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const preparedPrompt = String(prompt ?? "").trim();
    if (!preparedPrompt) { throw new Error("generate requires a non-empty prompt"); }

    const json = await this.post("/api/generate", { prompt: preparedPrompt }, signal);
    if (typeof json.response !== "string") {
      throw new Error(`Ollama /api/generate did not return a text response for model "${this.model}"`);
    }
    return json.response.trim();
  }

  async chat(messages: OllamaMessage[], tools: OllamaToolSpec[], signal?: AbortSignal): Promise<OllamaChatReply> {
    const json = await this.post("/api/chat", { messages, ...(tools.length ? { tools } : {}) }, signal);
    const message = json.message;
    if (!message || typeof message !== "object") {
      throw new Error(`Ollama /api/chat did not return a message for model "${this.model}"`);
    }
    const content = field(message, "content");
    const toolCalls = field(message, "tool_calls");
    return {
      content: typeof content === "string" ? content.trim() : "",
      toolCalls: parseToolCalls(toolCalls),
    };
  }
}
