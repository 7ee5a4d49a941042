#!/usr/bin/env node
// pattern: Imperative Shell

/**
 * termwise entry point.
 * Composition root that reads the request, wires the model server and search provider, and
 * prints the generated shell commands.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from './config/index.js';
import { runSingleShot, runToolLoop } from './agent/index.js';
import { createOllamaAdapter } from './model/index.js';
import { createDefaultProviderFactories, resolveSearchProvider } from './web/index.js';
import type { ModelProvider, OllamaOptions } from './model/index.js';
import type { ProviderFactories } from './web/index.js';

export const VERSION = '0.1.0';

export type CliOptions = {
  model?: string;
  endpoint?: string;
  websearch?: boolean;
  searchProvider?: string;
  braveApiKey?: string;
  maxResults?: number;
  maxIterations?: number;
  verbose?: boolean;
  config?: string;
};

export type InputStream = AsyncIterable<string | Buffer> & { isTTY?: boolean };

export type CliDependencies = {
  readonly createModel?: (options: OllamaOptions) => ModelProvider;
  readonly providerFactories?: (timeoutMs: number) => ProviderFactories;
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly stdin?: InputStream;
  readonly write?: (text: string) => void;
};

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

/**
 * The request comes from the positional argument when given, otherwise from standard input.
 */
export async function readUserPrompt(argPrompt: string | undefined, stdin: InputStream): Promise<string> {
  if (argPrompt !== undefined && argPrompt.trim() !== '') {
    return argPrompt;
  }

  if (stdin.isTTY) {
    throw new Error('no prompt provided via argument or stdin');
  }

  let buffer = '';
  for await (const chunk of stdin) {
    buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
  }

  const trimmed = buffer.trim();
  if (!trimmed) {
    throw new Error('no prompt provided via argument or stdin');
  }
  return trimmed;
}

/**
 * Turn a request into printable output. In websearch mode the search provider is resolved
 * before anything touches the network, so a configuration error never costs a request.
 */
export async function runCli(
  userRequest: string,
  options: CliOptions,
  deps: CliDependencies = {},
): Promise<string> {
  const config = loadConfig({
    configPath: options.config,
    env: deps.env,
    overrides: {
      model: options.model,
      endpoint: options.endpoint,
      websearch: options.websearch,
      searchProvider: options.searchProvider,
      braveApiKey: options.braveApiKey,
      maxResults: options.maxResults,
      maxIterations: options.maxIterations,
      verbose: options.verbose,
    },
  });

  const createModel = deps.createModel ?? createOllamaAdapter;

  if (!config.search.enabled) {
    const model = createModel({ endpoint: config.model.endpoint, timeoutMs: config.model.timeout_ms });
    return runSingleShot({ userRequest, modelName: config.model.name }, model);
  }

  const factories = (deps.providerFactories ?? createDefaultProviderFactories)(config.search.timeout_ms);
  const provider = resolveSearchProvider(
    { explicitChoice: config.search.provider, credential: config.search.brave_api_key },
    factories,
  );
  const model = createModel({ endpoint: config.model.endpoint, timeoutMs: config.model.timeout_ms });

  const answer = await runToolLoop(
    {
      userRequest,
      modelName: config.model.name,
      maxResults: config.search.max_results,
      maxIterations: config.agent.max_iterations,
      verbose: config.agent.verbose,
    },
    { model, provider },
  );

  return answer.text;
}

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('termwise')
    .description('Turn a natural-language request into shell commands using a local Ollama server')
    .version(VERSION)
    .argument('[prompt]', 'the natural language request (read from stdin when omitted)')
    .option('-m, --model <name>', 'model name (default: llama3.2, or TERMWISE_MODEL)')
    .option('-e, --endpoint <url>', 'Ollama endpoint URL (default: http://localhost:11434)')
    .option('-w, --websearch', 'let the model search the web through tool calling')
    .option('--search-provider <name>', 'search provider: duckduckgo or brave (brave is picked when an API key is set)')
    .option('--brave-api-key <key>', 'Brave Search API key (or BRAVE_API_KEY)')
    .option('--max-results <n>', 'maximum number of search results per query (default: 5)', parsePositiveInt)
    .option('--max-iterations <n>', 'maximum model exchanges in websearch mode (default: 10)', parsePositiveInt)
    .option('-v, --verbose', 'show the searches made and their top sources above the answer')
    .option('-c, --config <path>', 'path to a TOML config file (default: ~/.config/termwise/config.toml)')
    .action(async (prompt: string | undefined, options: CliOptions) => {
      const userRequest = await readUserPrompt(prompt, deps.stdin ?? process.stdin);
      const text = await runCli(userRequest, options, deps);
      (deps.write ?? ((out: string) => process.stdout.write(out)))(`${text}\n`);
    });

  return program;
}

export function formatFatalError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `error: ${message.replace(/\s+/g, ' ').trim()}`;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Run main entry point only when file is executed directly
if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(formatFatalError(error));
    process.exit(1);
  });
}
