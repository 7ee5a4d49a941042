// pattern: Functional Core

export type {
  ToolCall,
  ToolDefinition,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  Message,
  ChatRequest,
  ChatResponse,
  GenerateRequest,
  ModelErrorCode,
} from "./types.js";

export { ModelError, type ModelProvider } from "./types.js";
export {
  createOllamaAdapter,
  normalizeMessage,
  DEFAULT_OLLAMA_ENDPOINT,
  DEFAULT_MODEL_TIMEOUT_MS,
  type OllamaOptions,
} from "./ollama.js";
