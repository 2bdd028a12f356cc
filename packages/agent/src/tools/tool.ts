import type { ToolSchema } from '@toolloop/llm';
import type { Tool, ToolCall, ToolParameter, ToolResult } from '../types/index.js';
import { InvalidToolDefinitionError, ToolExecutionError } from '../types/index.js';

/** Keys the loop may pass alongside the model-supplied input. */
const INTERNAL_PARAMS: ReadonlySet<string> = new Set(['tool_call_id']);

export type ToolHandlerOutput = string | Omit<ToolResult, 'toolCallId'>;

export type ToolHandler = (
  input: Readonly<Record<string, unknown>>,
  context: { readonly toolCallId: string },
) => Promise<ToolHandlerOutput>;

export type ToolSpec = {
  readonly name: string;
  readonly description: string;
  readonly parameters?: ReadonlyArray<ToolParameter>;
  readonly isDangerous?: boolean;
  readonly handler: ToolHandler;
};

export function successResult(toolCallId: string, output: string, exitCode?: number): ToolResult {
  return {
    toolCallId,
    output,
    isError: false,
    ...(exitCode !== undefined ? { exitCode } : {}),
  };
}

export function errorResult(toolCallId: string, error: string, exitCode?: number): ToolResult {
  return {
    toolCallId,
    output: '',
    error,
    isError: true,
    ...(exitCode !== undefined ? { exitCode } : {}),
  };
}

export function buildInputSchema(parameters: ReadonlyArray<ToolParameter>): Record<string, unknown> {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: Array<string> = [];

  for (const param of parameters) {
    const schema: Record<string, unknown> = {
      type: param.type,
      description: param.description,
    };
    if (param.enum && param.enum.length > 0) {
      schema['enum'] = [...param.enum];
    }
    if (param.default !== undefined && param.default !== null) {
      schema['default'] = param.default;
    }
    properties[param.name] = schema;

    if (param.required ?? true) {
      required.push(param.name);
    }
  }

  return {
    type: 'object',
    properties,
    required,
  };
}

/**
 * Returns a list of problems with `input` against `parameters`; empty when
 * the input is acceptable.
 */
export function validateToolInput(
  parameters: ReadonlyArray<ToolParameter>,
  input: Readonly<Record<string, unknown>>,
): ReadonlyArray<string> {
  const known = new Set(parameters.map((p) => p.name));
  const provided = Object.keys(input);
  const problems: Array<string> = [];

  const unknown = provided.filter((key) => !known.has(key) && !INTERNAL_PARAMS.has(key));
  if (unknown.length > 0) {
    problems.push(`Unknown parameters: ${unknown.join(', ')}`);
  }

  const missing = parameters
    .filter((p) => (p.required ?? true) && !Object.hasOwn(input, p.name))
    .map((p) => p.name);
  if (missing.length > 0) {
    problems.push(`Missing required parameters: ${missing.join(', ')}`);
  }

  return problems;
}

export function createTool(spec: ToolSpec): Tool {
  const parameters = spec.parameters ?? [];

  if (!spec.name) {
    throw new InvalidToolDefinitionError('Tool name cannot be empty');
  }
  if (!spec.description) {
    throw new InvalidToolDefinitionError(`Tool '${spec.name}' description cannot be empty`);
  }
  const names = parameters.map((p) => p.name);
  if (new Set(names).size !== names.length) {
    throw new InvalidToolDefinitionError(`Tool '${spec.name}' parameter names must be unique`);
  }

  const inputSchema = buildInputSchema(parameters);

  return {
    name: spec.name,
    description: spec.description,
    parameters,
    isDangerous: spec.isDangerous ?? false,
    getToolDefinition: (): ToolSchema => ({
      name: spec.name,
      description: spec.description,
      inputSchema,
    }),
    async execute(toolCallId, input) {
      const problems = validateToolInput(parameters, input);
      if (problems.length > 0) {
        return errorResult(toolCallId, problems.join('; '));
      }

      try {
        const output = await spec.handler(input, { toolCallId });
        if (typeof output === 'string') {
          return successResult(toolCallId, output);
        }
        return { ...output, toolCallId };
      } catch (error) {
        if (error instanceof ToolExecutionError) {
          return errorResult(toolCallId, error.message, error.exitCode ?? undefined);
        }
        throw error;
      }
    },
  };
}

export function formatToolCall(call: ToolCall): string {
  const args = Object.entries(call.input)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(', ');
  return `${call.name}(${args})`;
}

const PREVIEW_LENGTH = 200;

export function formatToolResult(result: ToolResult): string {
  if (result.isError) {
    return `Error: ${result.error ?? result.output}`;
  }
  if (result.output.length > PREVIEW_LENGTH) {
    return `${result.output.slice(0, PREVIEW_LENGTH)}...`;
  }
  return result.output;
}
