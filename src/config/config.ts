// pattern: Imperative Shell

import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigError } from "./errors.js";
import { AppConfigSchema } from "./schema.js";
import type { AppConfig } from "./schema.js";

/**
 * Values from command-line flags. They win over environment variables, which win over the
 * config file, which wins over schema defaults.
 */
export type ConfigOverrides = {
  readonly model?: string;
  readonly endpoint?: string;
  readonly websearch?: boolean;
  readonly searchProvider?: string;
  readonly braveApiKey?: string;
  readonly maxResults?: number;
  readonly maxIterations?: number;
  readonly verbose?: boolean;
};

export type LoadConfigOptions = {
  readonly configPath?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly overrides?: ConfigOverrides;
};

type Section = Record<string, unknown>;

export function defaultConfigPath(): string {
  return join(homedir(), ".config", "termwise", "config.toml");
}

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(source: Section, key: string): Section {
  const value = source[key];
  return isRecord(value) ? { ...value } : {};
}

function setIfDefined(target: Section, key: string, value: unknown): void {
  if (value !== undefined && value !== "") {
    target[key] = value;
  }
}

function presentOrUndefined(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

function readConfigFile(configPath: string | undefined): Section {
  const resolvedPath = resolve(configPath ?? defaultConfigPath());

  if (!existsSync(resolvedPath)) {
    if (configPath !== undefined) {
      throw new ConfigError(`config file not found: ${resolvedPath}`);
    }
    return {};
  }

  try {
    return TOML.parse(readFileSync(resolvedPath, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`could not read config file ${resolvedPath}: ${detail}`);
  }
}

export function formatConfigIssues(issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }>): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const configPath = presentOrUndefined(options.configPath) ?? presentOrUndefined(env["TERMWISE_CONFIG"]);
  const parsed = readConfigFile(configPath);

  const model = section(parsed, "model");
  const search = section(parsed, "search");
  const agent = section(parsed, "agent");

  // Environment variables
  setIfDefined(model, "name", env["TERMWISE_MODEL"]);
  setIfDefined(model, "endpoint", env["TERMWISE_ENDPOINT"]);
  setIfDefined(search, "provider", env["TERMWISE_SEARCH_PROVIDER"]);
  setIfDefined(search, "brave_api_key", env["BRAVE_API_KEY"]);

  // Command-line flags
  setIfDefined(model, "name", overrides.model);
  setIfDefined(model, "endpoint", overrides.endpoint);
  setIfDefined(search, "enabled", overrides.websearch || undefined);
  setIfDefined(search, "provider", overrides.searchProvider);
  setIfDefined(search, "brave_api_key", overrides.braveApiKey);
  setIfDefined(search, "max_results", overrides.maxResults);
  setIfDefined(agent, "max_iterations", overrides.maxIterations);
  setIfDefined(agent, "verbose", overrides.verbose || undefined);

  const result = AppConfigSchema.safeParse({ ...parsed, model, search, agent });
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${formatConfigIssues(result.error.issues)}`);
  }
  return result.data;
}
