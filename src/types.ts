export type Role = "user" | "assistant" | "tool";

export type ToolCallDescriptor = {
  id: string;
  name: string;
  /** null when the model sent something other than a JSON object */
  arguments: Record<string, unknown> | null;
};

export type Message = {
  role: Role;
  content: string | null;
  name?: string;
  tool_call_id?: string;
  tool_calls?: ToolCallDescriptor[];
};

export type ParameterType = "string" | "number" | "integer" | "boolean" | "array" | "object";

export type FunctionParameter = {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  items?: ParameterType;
};

export type FunctionDescriptor = {
  name: string;
  description: string;
  parameters: readonly FunctionParameter[];
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type ModelReply = { content: string | null; toolCalls?: ToolCallDescriptor[] };

export interface LLMClient {
  generate(systemPrompt: string, messages: readonly Message[], tools?: ToolDefinition[]): Promise<ModelReply>;
}

export type ResourceKind = "svg" | "png" | "json" | "text";

export type ResourceHandle = {
  id: string;
  kind: ResourceKind;
  path: string;
  createdAt: Date;
};
