import type { RunConfig, Tool, ToolCall, ToolDefinition } from '../types/index.js';
import { toToolDefinition } from '../types/index.js';
import type { EventDispatcher } from '../events/dispatcher.js';
import type { Logger } from '../logging/logger.js';

/**
 * Strategy consulted for dangerous tools in manual mode. May block on
 * interactive I/O; concurrent prompts then resolve one at a time.
 */
export interface ApprovalHandler {
  approve(call: ToolCall, definition: ToolDefinition): boolean | Promise<boolean>;
}

export type ApprovalDecision =
  | { readonly allowed: true }
  | { readonly allowed: false; readonly reason: string };

export type PolicyVerdict =
  | { readonly kind: 'allow' }
  | { readonly kind: 'deny'; readonly reason: string }
  | { readonly kind: 'ask' };

export type ApprovalGate = {
  readonly decide: (call: ToolCall, tool: Tool, iteration: number) => Promise<ApprovalDecision>;
};

export type ApprovalGateOptions = {
  readonly config: RunConfig;
  readonly handler?: ApprovalHandler;
  readonly events: EventDispatcher;
  readonly logger: Logger;
};

/**
 * Static part of the decision: everything except the human in the loop.
 */
export function evaluatePolicy(config: RunConfig, tool: Pick<Tool, 'name' | 'isDangerous'>): PolicyVerdict {
  if (!config.enableTools) {
    return { kind: 'deny', reason: 'Tool use is disabled' };
  }
  if (config.blockedTools.includes(tool.name)) {
    return { kind: 'deny', reason: `Tool '${tool.name}' is blocked` };
  }
  if (config.allowedTools.length > 0 && !config.allowedTools.includes(tool.name)) {
    return { kind: 'deny', reason: `Tool '${tool.name}' is not allow-listed` };
  }

  switch (config.approvalMode) {
    case 'disabled':
      return { kind: 'deny', reason: 'Tool approval mode is disabled' };
    case 'auto':
      return { kind: 'allow' };
    case 'manual':
      return tool.isDangerous ? { kind: 'ask' } : { kind: 'allow' };
  }
}

/**
 * Whether a tool's definition goes to the backend. Dangerous tools are still
 * advertised in manual mode; approval is enforced when the call runs.
 */
export function isToolAdvertised(config: RunConfig, tool: Pick<Tool, 'name' | 'isDangerous'>): boolean {
  return evaluatePolicy(config, tool).kind !== 'deny';
}

export function createApprovalGate(options: ApprovalGateOptions): ApprovalGate {
  const { config, handler, events, logger } = options;

  const deny = (call: ToolCall, tool: Tool, iteration: number, reason: string): ApprovalDecision => {
    logger.warn({ tool: tool.name, toolCallId: call.id, reason }, 'tool call denied');
    events.emit({
      type: 'TOOL_DENIED',
      iteration,
      toolName: tool.name,
      toolCallId: call.id,
      message: `Tool execution denied: ${tool.name}`,
      data: { reason },
    });
    return { allowed: false, reason };
  };

  const ask = async (approver: ApprovalHandler, call: ToolCall, tool: Tool): Promise<boolean | Error> => {
    try {
      return await approver.approve(call, toToolDefinition(tool));
    } catch (error) {
      return error instanceof Error ? error : new Error(String(error));
    }
  };

  return {
    async decide(call, tool, iteration) {
      const verdict = evaluatePolicy(config, tool);

      if (verdict.kind === 'allow') {
        return { allowed: true };
      }
      if (verdict.kind === 'deny') {
        return deny(call, tool, iteration, verdict.reason);
      }

      events.emit({
        type: 'TOOL_APPROVAL_NEEDED',
        iteration,
        toolName: tool.name,
        toolCallId: call.id,
        message: `Approval required for tool: ${tool.name}`,
        data: { toolInput: call.input },
      });

      if (!handler) {
        return deny(call, tool, iteration, `Manual approval required for '${tool.name}', no handler`);
      }

      const answer = await ask(handler, call, tool);

      if (answer instanceof Error) {
        logger.error({ err: answer, tool: tool.name }, 'approval handler failed');
        return deny(call, tool, iteration, `Approval handler failed: ${answer.message}`);
      }
      if (!answer) {
        return deny(call, tool, iteration, 'Tool execution denied by user');
      }

      events.emit({
        type: 'TOOL_APPROVED',
        iteration,
        toolName: tool.name,
        toolCallId: call.id,
        message: `Tool execution approved: ${tool.name}`,
      });
      return { allowed: true };
    },
  };
}
