import type { ToolCall, ToolResult } from './tool.js';

export type StoppedReason = 'completed' | 'max_iterations' | 'timeout' | 'error';

export type AgentResult = {
  readonly success: boolean;
  readonly finalResponse: string;
  readonly iterations: number;
  readonly toolCallsMade: ReadonlyArray<ToolCall>;
  readonly toolResults: ReadonlyArray<ToolResult>;
  readonly error?: string;
  readonly stoppedReason: StoppedReason;
};
