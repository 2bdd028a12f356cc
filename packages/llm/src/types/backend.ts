import type { MessageContent } from './content.js';
import type { Message } from './message.js';
import type { ToolSchema } from './tool.js';

export type CompletionRequest = {
  readonly messages: ReadonlyArray<Message>;
  readonly model?: string;
  readonly tools?: ReadonlyArray<ToolSchema>;
  readonly signal?: AbortSignal;
};

export type CompletionResponse = {
  readonly content: MessageContent | null;
  readonly model?: string;
  readonly stopReason?: string | null;
};

export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export type Middleware = (
  request: CompletionRequest,
  next: (request: CompletionRequest) => Promise<CompletionResponse>,
) => Promise<CompletionResponse>;
