// pattern: Functional Core

export type {
  ToolParameterType,
  ToolParameter,
  ToolDefinition,
  ToolResult,
  ToolHandler,
  Tool,
  ToolRegistry,
} from './types.js';
export { ToolArgumentError } from './types.js';
export { createToolRegistry } from './registry.js';
export {
  createWebSearchTool,
  WEB_SEARCH_TOOL_NAME,
  type SearchRecorder,
  type WebSearchToolOptions,
} from './builtin/web.js';
