export type Role = 'system' | 'user' | 'assistant';

export type TextBlock = {
  readonly type: 'text';
  readonly text: string;
};

export type ToolUseBlock = {
  readonly type: 'tool_use';
  readonly id: string;
  readonly name: string;
  readonly input: Record<string, unknown>;
};

export type ToolResultBlock = {
  readonly type: 'tool_result';
  readonly tool_use_id: string;
  readonly content: string;
  readonly is_error: boolean;
};

export type WireBlock = TextBlock | ToolUseBlock | ToolResultBlock;

/**
 * Message content as it travels to and from a backend. Block lists stay
 * `unknown` here: backends are free to return shapes the agent layer has
 * not validated yet.
 */
export type MessageContent = string | ReadonlyArray<unknown>;
