import type { ToolSchema } from '@toolloop/llm';

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

export type ToolParameter = {
  readonly name: string;
  readonly type: ParameterType;
  readonly description: string;
  readonly required?: boolean;
  readonly default?: unknown;
  readonly enum?: ReadonlyArray<string>;
};

export type ToolCall = {
  readonly id: string;
  readonly name: string;
  readonly input: Readonly<Record<string, unknown>>;
};

export type ToolResult = {
  readonly toolCallId: string;
  readonly output: string;
  readonly error?: string;
  readonly isError: boolean;
  readonly exitCode?: number;
};

export type ToolDefinition = {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
  readonly isDangerous: boolean;
};

/**
 * Contract every callable capability satisfies. `execute` reports
 * foreseeable failures through `isError` rather than throwing; the loop
 * still converts anything thrown into an error result.
 */
export type Tool = {
  readonly name: string;
  readonly description: string;
  readonly parameters: ReadonlyArray<ToolParameter>;
  readonly isDangerous: boolean;
  readonly getToolDefinition: () => ToolSchema;
  readonly execute: (
    toolCallId: string,
    input: Readonly<Record<string, unknown>>,
  ) => Promise<ToolResult>;
};

export function toToolDefinition(tool: Tool): ToolDefinition {
  const schema = tool.getToolDefinition();
  return {
    name: schema.name,
    description: schema.description,
    inputSchema: schema.inputSchema,
    isDangerous: tool.isDangerous,
  };
}
