import { z } from "zod";

import { createLogger } from "../../logging.ts";
import type { OllamaChatReply, OllamaClient, OllamaMessage, OllamaToolSpec } from "../llm/ollama.ts";
import type { Decision, PolicyState, RegisteredTool, SelectionPolicy } from "./types.ts";

const log = createLogger("rag.agent.policy");

export function toOllamaTools(tools: RegisteredTool[]): OllamaToolSpec[] {
  return tools.map((tool) => ({
    type: "function" as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: z.toJSONSchema(tool.inputSchema, { io: "input", unrepresentable: "any" }),
    },
  }));
}

function systemPrompt(state: PolicyState): string {
  return (
    "You answer questions about documents stored in a vector database.\n" +
    `Collections available: ${state.collections.join(", ")}.\n` +
    "Call one tool at a time to gather evidence. When the evidence is enough to answer, reply with plain text and no tool call.\n" +
    "Never invent file ids or collection names."
  );
}

export function buildPolicyMessages(state: PolicyState): OllamaMessage[] {
  const messages: OllamaMessage[] = [
    { role: "system", content: systemPrompt(state) },
    { role: "user", content: state.query },
  ];

  for (const step of state.steps) {
    messages.push({
      role: "assistant",
      content: "",
      tool_calls: [{ function: { name: step.tool, arguments: step.input ?? {} } }],
    });
    messages.push({
      role: "tool",
      tool_name: step.tool,
      content: step.status === "ok" ? step.summary : `failed: ${step.error ?? step.summary}`,
    });
  }

  return messages;
}

/**
 * Lets an Ollama model choose tools through native tool calling. When the model
 * call itself fails, the decision comes from `fallback` instead.
 */
export class OllamaToolPolicy implements SelectionPolicy {
  readonly name = "ollama";
  private readonly client: OllamaClient;
  private readonly fallback: SelectionPolicy;

  constructor(client: OllamaClient, fallback: SelectionPolicy) {
    this.client = client;
    this.fallback = fallback;
  }

  async next(state: PolicyState, signal?: AbortSignal): Promise<Decision> {
    let reply: OllamaChatReply;
    try {
      reply = await this.client.chat(buildPolicyMessages(state), toOllamaTools(state.tools), signal);
    } catch (error: unknown) {
      if (signal?.aborted) { throw error; }
      log.warn("tool selection via model failed; using fallback policy", {
        fallback: this.fallback.name,
        reason: error instanceof Error ? error.message : String(error),
      });
      return this.fallback.next(state, signal);
    }

    const call = reply.toolCalls[0];
    if (!call) {
      return { kind: "synthesize", rationale: reply.content ? "model answered without a tool call" : "model made no tool call" };
    }
    return { kind: "invoke", tool: call.function.name, input: call.function.arguments, rationale: "model tool call" };
  }
}
