// pattern: Functional Core

/**
 * Shared types for model providers.
 * These types define the port interface that the model server adapter normalizes to.
 */

export type ToolCall = {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
};

export type SystemMessage = {
  role: "system";
  content: string;
};

export type UserMessage = {
  role: "user";
  content: string;
};

export type AssistantMessage = {
  role: "assistant";
  content: string;
  tool_calls?: ReadonlyArray<ToolCall>;
};

export type ToolMessage = {
  role: "tool";
  content: string;
  tool_call_id: string;
};

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type ChatRequest = {
  model: string;
  messages: ReadonlyArray<Message>;
  tools?: ReadonlyArray<ToolDefinition>;
};

export type ChatResponse = {
  content: string;
  tool_calls: ReadonlyArray<ToolCall>;
};

export type GenerateRequest = {
  model: string;
  prompt: string;
};

export type ModelErrorCode = "http" | "decode" | "timeout" | "connection" | "unsupported_tools";

export class ModelError extends Error {
  constructor(
    public code: ModelErrorCode,
    message: string = "",
    public status?: number
  ) {
    super(message);
    this.name = "ModelError";
  }
}

export interface ModelProvider {
  chat(request: ChatRequest): Promise<ChatResponse>;
  generate(request: GenerateRequest): Promise<string>;
}
