// pattern: Imperative Shell

import { z } from "zod";
import type {
  ChatRequest,
  ChatResponse,
  GenerateRequest,
  Message,
  ModelProvider,
  ToolCall,
  ToolDefinition,
} from "./types.js";
import { ModelError } from "./types.js";

export const DEFAULT_OLLAMA_ENDPOINT = "http://localhost:11434";
export const DEFAULT_MODEL_TIMEOUT_MS = 30000;

export type OllamaOptions = {
  readonly endpoint?: string;
  readonly timeoutMs?: number;
};

type OllamaToolCall = {
  id: string;
  type: "function";
  function: {
    name: string;
    arguments: Record<string, unknown>;
  };
};

type OllamaMessage = {
  role: Message["role"];
  content: string;
  tool_calls?: Array<OllamaToolCall>;
  tool_call_id?: string;
};

type OllamaTool = {
  type: "function";
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
};

const OllamaChatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string().nullish(),
    tool_calls: z
      .array(
        z.object({
          id: z.string().optional(),
          function: z.object({
            name: z.string(),
            arguments: z.union([z.record(z.unknown()), z.string()]).default({}),
          }),
        })
      )
      .nullish(),
  }),
});

const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
});

const ArgumentsSchema = z.record(z.unknown());

const UNSUPPORTED_TOOLS_MARKER = "does not support tools";

function normalizeToolDefinitions(tools: ReadonlyArray<ToolDefinition>): Array<OllamaTool> {
  return tools.map((tool) => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.input_schema,
    },
  }));
}

export function normalizeMessage(msg: Message): OllamaMessage {
  switch (msg.role) {
    case "assistant":
      if (msg.tool_calls && msg.tool_calls.length > 0) {
        return {
          role: "assistant",
          content: msg.content,
          tool_calls: msg.tool_calls.map((call) => ({
            id: call.id,
            type: "function",
            function: { name: call.name, arguments: call.arguments },
          })),
        };
      }
      return { role: "assistant", content: msg.content };
    case "tool":
      return { role: "tool", content: msg.content, tool_call_id: msg.tool_call_id };
    default:
      return { role: msg.role, content: msg.content };
  }
}

function parseArguments(raw: Record<string, unknown> | string, toolName: string): Record<string, unknown> {
  if (typeof raw !== "string") {
    return raw;
  }

  let parsed: unknown;
  try {
    parsed = raw.trim() === "" ? {} : JSON.parse(raw);
  } catch {
    throw new ModelError("decode", `failed to parse arguments for tool ${toolName}: ${raw}`);
  }

  const result = ArgumentsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ModelError("decode", `arguments for tool ${toolName} are not an object: ${raw}`);
  }
  return result.data;
}

function decodeJson<T>(body: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    throw new ModelError("decode", `model server returned malformed JSON for ${what}`);
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ModelError("decode", `model server returned an unexpected ${what} body: ${result.error.message}`);
  }
  return result.data;
}

function extractErrorDetail(body: string): string {
  try {
    const parsed = z.object({ error: z.string() }).safeParse(JSON.parse(body));
    if (parsed.success) return parsed.data.error;
  } catch {
    // not JSON, report the raw text
  }
  return body.trim();
}

export function createOllamaAdapter(options: OllamaOptions = {}): ModelProvider {
  const endpoint = (options.endpoint ?? DEFAULT_OLLAMA_ENDPOINT).replace(/\/+$/, "");
  const timeoutMs = options.timeoutMs ?? DEFAULT_MODEL_TIMEOUT_MS;

  async function post(path: string, payload: Record<string, unknown>, model: string): Promise<string> {
    try {
      const response = await fetch(`${endpoint}${path}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutMs),
      });

      const body = await response.text();

      if (!response.ok) {
        const detail = extractErrorDetail(body);
        if (detail.includes(UNSUPPORTED_TOOLS_MARKER)) {
          throw new ModelError("unsupported_tools", `model ${model} does not support tool calling`, response.status);
        }
        throw new ModelError(
          "http",
          detail ? `model server returned status ${response.status}: ${detail}` : `model server returned status ${response.status}`,
          response.status
        );
      }

      return body;
    } catch (error) {
      if (error instanceof ModelError) {
        throw error;
      }
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new ModelError("timeout", `model server at ${endpoint} did not answer within ${timeoutMs}ms`);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ModelError("connection", `failed to connect to model server at ${endpoint}: ${detail}`);
    }
  }

  return {
    async chat(request: ChatRequest): Promise<ChatResponse> {
      const body = await post(
        "/api/chat",
        {
          model: request.model,
          messages: request.messages.map(normalizeMessage),
          ...(request.tools && request.tools.length > 0 ? { tools: normalizeToolDefinitions(request.tools) } : {}),
          stream: false,
        },
        request.model
      );

      const data = decodeJson(body, OllamaChatResponseSchema, "chat");
      const toolCalls: Array<ToolCall> = (data.message.tool_calls ?? []).map((call, index) => ({
        id: call.id ?? `call_${index}`,
        name: call.function.name,
        arguments: parseArguments(call.function.arguments, call.function.name),
      }));

      return {
        content: data.message.content ?? "",
        tool_calls: toolCalls,
      };
    },

    async generate(request: GenerateRequest): Promise<string> {
      const body = await post(
        "/api/generate",
        {
          model: request.model,
          prompt: request.prompt,
          stream: false,
        },
        request.model
      );

      return decodeJson(body, OllamaGenerateResponseSchema, "generate").response;
    },
  };
}
