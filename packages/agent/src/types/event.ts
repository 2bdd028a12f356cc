export type AgentEventType =
  | 'ITERATION_START'
  | 'ITERATION_END'
  | 'AI_RESPONSE'
  | 'TOOL_START'
  | 'TOOL_COMPLETE'
  | 'TOOL_ERROR'
  | 'TOOL_APPROVAL_NEEDED'
  | 'TOOL_APPROVED'
  | 'TOOL_DENIED'
  | 'AGENT_COMPLETE';

export type AgentEvent = {
  readonly type: AgentEventType;
  /** 1-based; tool events carry the iteration their call was issued in. */
  readonly iteration: number;
  readonly toolName?: string;
  readonly toolCallId?: string;
  readonly message: string;
  readonly data: Readonly<Record<string, unknown>>;
  readonly timestamp: string;
};

export interface AgentEventListener {
  onEvent(event: AgentEvent): void;
}
