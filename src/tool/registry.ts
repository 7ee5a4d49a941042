// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Manages tool registration, parameter validation, dispatch, and the JSON schema handed to the model.
 */

import type { ToolDefinition as ModelToolDefinition } from '../model/types.js';
import { ToolArgumentError } from './types.js';
import type {
  Tool,
  ToolParameterType,
  ToolResult,
  ToolRegistry,
} from './types.js';

function validateParameterType(
  value: unknown,
  expectedType: ToolParameterType,
): boolean {
  switch (expectedType) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    default:
      return false;
  }
}

function validateParams(tool: Tool, params: Record<string, unknown>): void {
  for (const param of tool.definition.parameters) {
    const value = params[param.name];

    if (value === undefined || value === null) {
      if (param.required) {
        throw new ToolArgumentError(
          tool.definition.name,
          `missing required parameter for ${tool.definition.name}: ${param.name}`,
        );
      }
      continue;
    }

    if (!validateParameterType(value, param.type)) {
      throw new ToolArgumentError(
        tool.definition.name,
        `invalid type for parameter ${param.name}: expected ${param.type}, got ${typeof value}`,
      );
    }

    if (param.enum_values && typeof value === 'string' && !param.enum_values.includes(value)) {
      throw new ToolArgumentError(
        tool.definition.name,
        `invalid value for parameter ${param.name}: expected one of ${param.enum_values.join(', ')}`,
      );
    }

    if (param.required && typeof value === 'string' && value.trim() === '') {
      throw new ToolArgumentError(
        tool.definition.name,
        `empty required parameter for ${tool.definition.name}: ${param.name}`,
      );
    }
  }
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, Tool>();

  return {
    register(tool: Tool): void {
      if (tools.has(tool.definition.name)) {
        throw new Error(
          `tool already registered: ${tool.definition.name}`,
        );
      }
      tools.set(tool.definition.name, tool);
    },

    async dispatch(
      name: string,
      params: Record<string, unknown>,
    ): Promise<ToolResult> {
      const tool = tools.get(name);
      if (!tool) {
        return {
          success: false,
          output: '',
          error: `unknown tool: ${name}`,
        };
      }

      validateParams(tool, params);

      try {
        return await tool.handler(params);
      } catch (error) {
        return {
          success: false,
          output: '',
          error: `handler error: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    },

    toModelTools(): Array<ModelToolDefinition> {
      return Array.from(tools.values()).map((tool) => {
        const properties: Record<string, unknown> = {};
        const required: Array<string> = [];

        for (const param of tool.definition.parameters) {
          properties[param.name] = {
            type: param.type,
            description: param.description,
            ...(param.enum_values && { enum: param.enum_values }),
          };

          if (param.required) {
            required.push(param.name);
          }
        }

        return {
          name: tool.definition.name,
          description: tool.definition.description,
          input_schema: {
            type: 'object',
            properties,
            required,
          },
        };
      });
    },
  };
}
