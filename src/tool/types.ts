// pattern: Functional Core

/**
 * Tool system types for registration, dispatch, and model integration.
 * These types define the port interface for the tool registry and tool handlers.
 */

import type { ToolDefinition as ModelToolDefinition } from '../model/types.js';

export type ToolParameterType = 'string' | 'number' | 'boolean' | 'object' | 'array';

export type ToolParameter = {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum_values?: ReadonlyArray<string>;
};

export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ReadonlyArray<ToolParameter>;
};

export type ToolResult = {
  success: boolean;
  output: string;
  error?: string;
};

export type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResult>;

export type Tool = {
  definition: ToolDefinition;
  handler: ToolHandler;
};

export interface ToolRegistry {
  register(tool: Tool): void;
  dispatch(name: string, params: Record<string, unknown>): Promise<ToolResult>;
  toModelTools(): Array<ModelToolDefinition>;
}

/**
 * Raised when a call names a known tool but its arguments do not satisfy the tool's parameters.
 * Unlike an unknown tool name, this is not reported back to the model.
 */
export class ToolArgumentError extends Error {
  constructor(
    public toolName: string,
    message: string = '',
  ) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}
