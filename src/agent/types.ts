// pattern: Functional Core

/**
 * Agent types for the tool-calling loop.
 * These types define the conversation log, the loop's inputs and dependencies, and its result.
 */

import type { ModelProvider, ToolCall } from '../model/types.js';
import type { SearchProvider } from '../web/types.js';

export type SystemTurn = {
  readonly kind: 'system';
  readonly instruction: string;
};

export type UserTurn = {
  readonly kind: 'user';
  readonly text: string;
};

export type AssistantTextTurn = {
  readonly kind: 'assistant_text';
  readonly text: string;
};

export type AssistantToolCallTurn = {
  readonly kind: 'assistant_tool_calls';
  readonly calls: ReadonlyArray<ToolCall>;
};

export type ToolResultTurn = {
  readonly kind: 'tool_result';
  readonly callId: string;
  readonly payload: string;
};

export type Turn = SystemTurn | UserTurn | AssistantTextTurn | AssistantToolCallTurn | ToolResultTurn;

export type SourceSummary = {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
};

export type TraceEntry = {
  readonly query: string;
  readonly sources: ReadonlyArray<SourceSummary>;
};

export type ToolLoopOptions = {
  readonly userRequest: string;
  readonly modelName: string;
  readonly maxResults: number;
  readonly maxIterations?: number;
  readonly verbose?: boolean;
};

export type ToolLoopDependencies = {
  readonly model: ModelProvider;
  readonly provider: SearchProvider;
};

export type FinalAnswer = {
  /** What the caller prints: the bare answer, or the answer under a rendered trace. */
  readonly text: string;
  readonly answer: string;
  readonly trace: ReadonlyArray<TraceEntry>;
  readonly turns: ReadonlyArray<Turn>;
  readonly iterations: number;
};

export type EngineErrorCode = 'malformed_tool_call' | 'iteration_limit_exceeded';

export class EngineError extends Error {
  constructor(
    public code: EngineErrorCode,
    message: string = '',
    public maxIterations?: number,
  ) {
    super(message);
    this.name = 'EngineError';
  }
}
