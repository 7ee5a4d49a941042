// pattern: Functional Core
import { z } from "zod";
import { DEFAULT_MODEL_TIMEOUT_MS, DEFAULT_OLLAMA_ENDPOINT } from "../model/ollama.js";
import { DEFAULT_PROVIDER_TIMEOUT_MS } from "../web/request.js";

export const DEFAULT_MODEL_NAME = "llama3.2";

const ModelConfigSchema = z.object({
  name: z.string().min(1).default(DEFAULT_MODEL_NAME),
  endpoint: z.string().url().default(DEFAULT_OLLAMA_ENDPOINT),
  timeout_ms: z.number().int().positive().default(DEFAULT_MODEL_TIMEOUT_MS),
});

const SearchConfigSchema = z.object({
  enabled: z.boolean().default(false),
  provider: z.string().optional(),
  brave_api_key: z.string().optional(),
  max_results: z.number().int().positive().default(5),
  timeout_ms: z.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),
});

const AgentConfigSchema = z.object({
  max_iterations: z.number().int().positive().default(10),
  verbose: z.boolean().default(false),
});

const AppConfigSchema = z.object({
  model: ModelConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export { AppConfigSchema, ModelConfigSchema, SearchConfigSchema, AgentConfigSchema };
