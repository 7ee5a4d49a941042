// pattern: Functional Core

export type {
  SystemTurn,
  UserTurn,
  AssistantTextTurn,
  AssistantToolCallTurn,
  ToolResultTurn,
  Turn,
  SourceSummary,
  TraceEntry,
  ToolLoopOptions,
  ToolLoopDependencies,
  FinalAnswer,
  EngineErrorCode,
} from './types.js';
export { EngineError } from './types.js';
export { createConversation, type Conversation } from './conversation.js';
export {
  createTraceCollector,
  renderTrace,
  summarizeResults,
  truncateSnippet,
  type TraceCollector,
  type TraceCollectorOptions,
} from './trace.js';
export { buildSystemInstruction, buildSingleShotPrompt } from './prompt.js';
export { runToolLoop, DEFAULT_MAX_ITERATIONS } from './loop.js';
export { runSingleShot, type SingleShotOptions } from './single-shot.js';
