import type { Tool, ToolCall, ToolResult } from '../types/index.js';
import { ToolDeniedError, ToolNotFoundError } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { errorResult } from '../tools/tool.js';
import type { ApprovalGate } from '../approval/gate.js';
import type { EventDispatcher } from '../events/dispatcher.js';
import type { MetricsSink } from '../metrics/tracker.js';
import type { Logger } from '../logging/logger.js';

export type ToolExecutionContext = {
  readonly iteration: number;
  readonly registry: ToolRegistry;
  readonly gate: ApprovalGate;
  readonly events: EventDispatcher;
  readonly metrics: MetricsSink | null;
  readonly logger: Logger;
};

const OUTPUT_PREVIEW_LENGTH = 100;

/**
 * Runs every call of one model turn concurrently. The returned results line
 * up index-for-index with `calls`, whatever order the tools finish in, and
 * one call failing never cancels its siblings.
 */
export async function executeToolCalls(
  calls: ReadonlyArray<ToolCall>,
  context: ToolExecutionContext,
): Promise<ReadonlyArray<ToolResult>> {
  const settled = await Promise.allSettled(calls.map((call) => executeToolCall(call, context)));

  return calls.map((call, index) => {
    const outcome = settled[index];

    if (outcome?.status === 'fulfilled') {
      return outcome.value;
    }

    const reason: unknown = outcome?.reason ?? 'unknown error';
    context.logger.error({ err: reason, tool: call.name }, 'tool task rejected');
    return errorResult(call.id, `Tool execution failed: ${describe(reason)}`);
  });
}

export async function executeToolCall(
  call: ToolCall,
  context: ToolExecutionContext,
): Promise<ToolResult> {
  const { iteration, registry, gate, events, logger } = context;

  const tool = registry.get(call.name);
  if (!tool) {
    const error = new ToolNotFoundError(call.name);
    logger.warn({ tool: call.name, toolCallId: call.id }, 'tool not found');
    events.emit({
      type: 'TOOL_ERROR',
      iteration,
      toolName: call.name,
      toolCallId: call.id,
      message: error.message,
    });
    return errorResult(call.id, error.message);
  }

  const decision = await gate.decide(call, tool, iteration);
  if (!decision.allowed) {
    const error = new ToolDeniedError(tool.name, decision.reason);
    return errorResult(call.id, error.message);
  }

  return runTool(call, tool, context);
}

async function runTool(call: ToolCall, tool: Tool, context: ToolExecutionContext): Promise<ToolResult> {
  const { iteration, events, metrics, logger } = context;

  events.emit({
    type: 'TOOL_START',
    iteration,
    toolName: tool.name,
    toolCallId: call.id,
    message: `Executing tool: ${tool.name}`,
    data: { toolInput: call.input },
  });

  logger.info({ tool: tool.name, toolCallId: call.id }, 'executing tool');
  const start = performance.now();

  let result: ToolResult;
  try {
    result = await tool.execute(call.id, call.input);
  } catch (error) {
    const durationMs = performance.now() - start;
    const message = describe(error);
    logger.error({ err: error, tool: tool.name }, 'tool execution threw');

    metrics?.record({
      toolName: tool.name,
      success: false,
      durationMs,
      timestamp: Date.now(),
      errorMessage: message,
    });

    events.emit({
      type: 'TOOL_ERROR',
      iteration,
      toolName: tool.name,
      toolCallId: call.id,
      message: `Tool exception: ${tool.name}`,
      data: { exception: message, durationMs },
    });

    return errorResult(call.id, `Tool execution failed: ${message}`);
  }

  const durationMs = performance.now() - start;

  metrics?.record({
    toolName: tool.name,
    success: !result.isError,
    durationMs,
    timestamp: Date.now(),
    ...(result.isError && result.error !== undefined ? { errorMessage: result.error } : {}),
  });

  if (result.isError) {
    events.emit({
      type: 'TOOL_ERROR',
      iteration,
      toolName: tool.name,
      toolCallId: call.id,
      message: `Tool failed: ${tool.name}`,
      data: { error: result.error ?? null, durationMs },
    });
  } else {
    events.emit({
      type: 'TOOL_COMPLETE',
      iteration,
      toolName: tool.name,
      toolCallId: call.id,
      message: `Tool completed: ${tool.name}`,
      data: { outputPreview: result.output.slice(0, OUTPUT_PREVIEW_LENGTH), durationMs },
    });
  }

  // Tools build their own results; pin the id to the call being answered.
  return result.toolCallId === call.id ? result : { ...result, toolCallId: call.id };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
