import { nanoid } from 'nanoid';
import type { CompletionBackend, CompletionResponse, Message, ToolSchema } from '@toolloop/llm';
import { AbortError, RequestTimeoutError, assistantMessage, toolResultMessage, withDeadline } from '@toolloop/llm';
import type {
  AgentEventListener,
  AgentResult,
  RunConfig,
  StoppedReason,
  ToolCall,
  ToolResult,
} from '../types/index.js';
import { CompletionTimeoutError, IterationLimitError } from '../types/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { formatToolCall } from '../tools/tool.js';
import { parseRunConfig, type RunConfigInput } from '../config/run-config.js';
import { createApprovalGate, isToolAdvertised, type ApprovalHandler } from '../approval/gate.js';
import { createEventDispatcher } from '../events/dispatcher.js';
import type { MetricsSink } from '../metrics/tracker.js';
import { getLogger, type Logger } from '../logging/logger.js';
import { extractTextContent, hasToolCalls, parseResponse } from '../parser/response-parser.js';
import { executeToolCalls } from './tool-execution.js';

export type AgentLoopOptions = {
  readonly backend: CompletionBackend;
  readonly registry: ToolRegistry;
  readonly config?: RunConfig | RunConfigInput;
  readonly metrics?: MetricsSink;
  readonly approvalHandler?: ApprovalHandler;
  readonly listener?: AgentEventListener;
  readonly logger?: Logger;
};

export type RunOptions = {
  readonly model?: string;
  readonly signal?: AbortSignal;
};

export type AgentLoop = {
  readonly config: RunConfig;
  readonly run: (messages: ReadonlyArray<Message>, options?: RunOptions) => Promise<AgentResult>;
};

type Progress = {
  iterations: number;
  readonly toolCallsMade: Array<ToolCall>;
  readonly toolResults: Array<ToolResult>;
};

function finish(
  progress: Progress,
  stoppedReason: StoppedReason,
  outcome: { readonly finalResponse?: string; readonly error?: string } = {},
): AgentResult {
  return {
    success: stoppedReason === 'completed',
    finalResponse: outcome.finalResponse ?? '',
    iterations: progress.iterations,
    toolCallsMade: [...progress.toolCallsMade],
    toolResults: [...progress.toolResults],
    ...(outcome.error !== undefined ? { error: outcome.error } : {}),
    stoppedReason,
  };
}

/**
 * Drives the model/tool cycle: request a completion, run the tools it asks
 * for, feed the results back, and repeat until the model answers without
 * tools or a terminal condition is hit. `run` never throws.
 */
export function createAgentLoop(options: AgentLoopOptions): AgentLoop {
  const config = parseRunConfig(options.config ?? {});
  const { backend, registry } = options;
  const baseLogger = (options.logger ?? getLogger()).child({ module: 'agent-loop' });

  const advertisedTools = (): ReadonlyArray<ToolSchema> => {
    if (!config.enableTools || config.approvalMode === 'disabled') {
      return [];
    }
    return registry
      .listTools()
      .filter((tool) => isToolAdvertised(config, tool))
      .map((tool) => tool.getToolDefinition());
  };

  const run = async (
    messages: ReadonlyArray<Message>,
    runOptions: RunOptions = {},
  ): Promise<AgentResult> => {
    const logger = baseLogger.child({ runId: nanoid() });
    const events = createEventDispatcher(options.listener, logger);
    const gate = createApprovalGate({
      config,
      events,
      logger,
      ...(options.approvalHandler ? { handler: options.approvalHandler } : {}),
    });

    const progress: Progress = { iterations: 0, toolCallsMade: [], toolResults: [] };
    const conversation: Array<Message> = [...messages];
    const { model, signal } = runOptions;

    logger.info({ maxIterations: config.maxIterations, approvalMode: config.approvalMode }, 'starting agent loop');

    try {
      while (progress.iterations < config.maxIterations) {
        if (signal?.aborted) {
          logger.warn('agent run aborted');
          return finish(progress, 'error', { error: 'Agent run aborted' });
        }

        progress.iterations++;
        const iteration = progress.iterations;
        logger.info({ iteration }, 'agent iteration');

        events.emit({
          type: 'ITERATION_START',
          iteration,
          message: `Starting iteration ${iteration}/${config.maxIterations}`,
        });

        const tools = advertisedTools();
        let response: CompletionResponse;

        try {
          const snapshot = [...conversation];
          response = await withDeadline(
            (requestSignal) =>
              backend.complete({
                messages: snapshot,
                ...(model !== undefined ? { model } : {}),
                ...(tools.length > 0 ? { tools } : {}),
                signal: requestSignal,
              }),
            config.timeoutPerIterationMs,
            signal,
          );
        } catch (error) {
          if (error instanceof RequestTimeoutError) {
            const timeout = new CompletionTimeoutError(iteration, config.timeoutPerIterationMs, error);
            logger.error({ iteration }, timeout.message);
            return finish(progress, 'timeout', { error: timeout.message });
          }
          if (error instanceof AbortError) {
            logger.warn({ iteration }, 'agent run aborted');
            return finish(progress, 'error', { error: 'Agent run aborted' });
          }
          throw error;
        }

        conversation.push(assistantMessage(response.content));

        events.emit({
          type: 'AI_RESPONSE',
          iteration,
          message: 'AI response received',
        });

        const toolCalls = hasToolCalls(response)
          ? parseResponse(response, (reason, block) => {
              logger.warn({ block }, `skipping invalid tool_use block: ${reason}`);
            })
          : [];

        if (toolCalls.length === 0) {
          if (hasToolCalls(response)) {
            logger.warn({ iteration }, 'response indicated tool use but no valid calls were parsed');
          }

          const finalResponse = extractTextContent(response);
          logger.info({ iterations: iteration }, 'agent completed');

          events.emit({
            type: 'AGENT_COMPLETE',
            iteration,
            message: `Agent completed after ${iteration} iterations`,
            data: { finalResponse },
          });

          return finish(progress, 'completed', { finalResponse });
        }

        logger.info({ iteration, calls: toolCalls.map(formatToolCall) }, 'model requested tool calls');

        const results = await executeToolCalls(toolCalls, {
          iteration,
          registry,
          gate,
          events,
          metrics: options.metrics ?? null,
          logger,
        });

        progress.toolCallsMade.push(...toolCalls);
        progress.toolResults.push(...results);

        for (const result of results) {
          const content = result.isError ? (result.error ?? result.output) : result.output;
          conversation.push(toolResultMessage(result.toolCallId, content, result.isError));
        }

        events.emit({
          type: 'ITERATION_END',
          iteration,
          message: `Iteration ${iteration} completed`,
          data: {
            toolsExecuted: toolCalls.length,
            toolsSucceeded: results.filter((r) => !r.isError).length,
          },
        });
      }

      const limit = new IterationLimitError(config.maxIterations);
      logger.warn(limit.message);
      return finish(progress, 'max_iterations', { error: limit.message });
    } catch (error) {
      logger.error({ err: error }, 'agent loop error');
      return finish(progress, 'error', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  return { config, run };
}
