import type { MessageContent, Role, ToolResultBlock } from './content.js';

export type Message = {
  readonly role: Role;
  readonly content: MessageContent | null;
};

export function systemMessage(text: string): Message {
  return {
    role: 'system',
    content: text,
  };
}

export function userMessage(content: MessageContent): Message {
  return {
    role: 'user',
    content,
  };
}

export function assistantMessage(content: MessageContent | null): Message {
  return {
    role: 'assistant',
    content,
  };
}

/**
 * Tool results travel back as a user turn holding a single `tool_result`
 * block, one turn per result.
 */
export function toolResultMessage(
  toolUseId: string,
  content: string,
  isError?: boolean,
): Message {
  const block: ToolResultBlock = {
    type: 'tool_result',
    tool_use_id: toolUseId,
    content,
    is_error: isError ?? false,
  };

  return {
    role: 'user',
    content: [block],
  };
}
