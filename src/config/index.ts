// pattern: Functional Core

export type { AppConfig, ModelConfig, SearchConfig, AgentConfig } from "./schema.js";
export { AppConfigSchema, DEFAULT_MODEL_NAME } from "./schema.js";
export { loadConfig, defaultConfigPath, formatConfigIssues, type ConfigOverrides, type LoadConfigOptions } from "./config.js";
export { ConfigError } from "./errors.js";
