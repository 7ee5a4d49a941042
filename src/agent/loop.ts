// pattern: Imperative Shell

/**
 * Bounded tool-calling loop.
 * Sends the conversation to the model, runs any requested tool calls one at a time in the
 * order the model emitted them, and stops at the first reply that carries no tool calls.
 */

import { ConfigError } from '../config/errors.js';
import { ToolArgumentError, createToolRegistry, createWebSearchTool } from '../tool/index.js';
import { createConversation } from './conversation.js';
import { createTraceCollector, renderTrace } from './trace.js';
import { EngineError } from './types.js';
import type { FinalAnswer, ToolLoopDependencies, ToolLoopOptions } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 10;

export async function runToolLoop(
  options: ToolLoopOptions,
  deps: ToolLoopDependencies,
): Promise<FinalAnswer> {
  const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const verbose = options.verbose ?? false;

  if (!Number.isInteger(maxIterations) || maxIterations < 1) {
    throw new ConfigError(`max iterations must be a positive integer, got ${maxIterations}`);
  }
  if (!Number.isInteger(options.maxResults) || options.maxResults < 1) {
    throw new ConfigError(`max results must be a positive integer, got ${options.maxResults}`);
  }

  const conversation = createConversation(options.userRequest);
  const trace = createTraceCollector({ includeSources: verbose });

  const registry = createToolRegistry();
  registry.register(createWebSearchTool({
    provider: deps.provider,
    maxResults: options.maxResults,
    recorder: trace,
  }));
  const tools = registry.toModelTools();

  for (let iteration = 0; iteration < maxIterations; iteration++) {
    const response = await deps.model.chat({
      model: options.modelName,
      messages: conversation.toMessages(),
      tools,
    });

    if (response.tool_calls.length > 0) {
      conversation.appendToolCalls(response.tool_calls);

      for (const call of response.tool_calls) {
        let payload: string;
        try {
          const result = await registry.dispatch(call.name, call.arguments);
          payload = result.success
            ? result.output
            : `Error executing tool ${call.name}: ${result.error ?? 'unknown error'}`;
        } catch (error) {
          if (error instanceof ToolArgumentError) {
            throw new EngineError('malformed_tool_call', `malformed tool call ${call.id}: ${error.message}`);
          }
          throw error;
        }

        conversation.appendToolResult(call.id, payload);
      }

      continue;
    }

    conversation.appendAssistantText(response.content);

    const entries = trace.entries();
    return {
      text: verbose && trace.hasSearches() ? renderTrace(entries, response.content) : response.content,
      answer: response.content,
      trace: entries,
      turns: conversation.turns(),
      iterations: iteration + 1,
    };
  }

  throw new EngineError(
    'iteration_limit_exceeded',
    `maximum iterations (${maxIterations}) exceeded: the model kept requesting tools`,
    maxIterations,
  );
}
