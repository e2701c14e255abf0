import OpenAI from "openai";
import type { ChatCompletionMessageParam, ChatCompletionTool } from "openai/resources/chat/completions";
import type { RelayConfig } from "./config.ts";
import { isPlainObject } from "./shared.ts";
import type { LLMClient, Message, ModelReply, ToolCallDescriptor, ToolDefinition } from "./types.ts";

export class EchoClient implements LLMClient {
  async generate(_systemPrompt: string, messages: readonly Message[]): Promise<ModelReply> {
    const lastUser = [...messages].reverse().find((m) => m.role === "user");
    return { content: lastUser?.content ? `Echo: ${lastUser.content}` : "Echo" };
  }
}

export class OpenAIClient implements LLMClient {
  private client: OpenAI;
  private model: string;

  constructor(model: string, apiKey: string, baseURL?: string, defaultQuery?: Record<string, string>) {
    if (!apiKey) {
      throw new Error("An API key is required for this provider");
    }
    // retries and timeouts are applied by the executor
    this.client = new OpenAI({ apiKey, baseURL, defaultQuery, maxRetries: 0 });
    this.model = model;
  }

  async generate(systemPrompt: string, messages: readonly Message[], tools?: ToolDefinition[]): Promise<ModelReply> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: "system", content: systemPrompt }, ...toOpenAIMessages(messages)],
      tools: tools?.length ? tools.map(toOpenAITool) : undefined,
      tool_choice: tools?.length ? "auto" : undefined,
    });

    const choice = completion.choices[0]?.message;
    if (!choice) return { content: null };
    const toolCalls = choice.tool_calls?.map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: parseToolArguments(call.function.arguments),
    }) satisfies ToolCallDescriptor);

    const content = typeof choice.content === "string" ? choice.content : null;
    return { content, toolCalls };
  }
}

export function buildClient(config: RelayConfig): LLMClient {
  if (config.provider === "openai") {
    return new OpenAIClient(config.model, config.apiKey ?? "", config.baseURL);
  }
  if (config.provider === "azure") {
    const endpoint = config.azureEndpoint ?? "";
    const baseURL = `${endpoint.replace(/\/$/, "")}/openai/deployments/${config.azureDeployment ?? ""}`;
    return new OpenAIClient(config.model, config.apiKey ?? "", baseURL, { "api-version": config.azureApiVersion });
  }
  return new EchoClient();
}

/** Empty arguments mean "no arguments"; anything that is not a JSON object becomes null. */
export function parseToolArguments(raw: string): Record<string, unknown> | null {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function toOpenAIMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    if (m.role === "assistant" && m.tool_calls?.length) {
      return {
        role: "assistant",
        content: m.content ?? "",
        tool_calls: m.tool_calls.map((call) => ({
          id: call.id,
          type: "function" as const,
          function: { name: call.name, arguments: JSON.stringify(call.arguments ?? {}) },
        })),
      };
    }
    if (m.role === "tool") {
      return { role: "tool", content: m.content ?? "", tool_call_id: m.tool_call_id ?? "" };
    }
    if (m.role === "assistant") {
      return { role: "assistant", content: m.content ?? "" };
    }
    return { role: "user", content: m.content ?? "" };
  });
}

function toOpenAITool(tool: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  } satisfies ChatCompletionTool;
}
