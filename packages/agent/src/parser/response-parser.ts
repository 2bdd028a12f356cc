import { z } from 'zod';
import type { CompletionResponse } from '@toolloop/llm';
import type { ToolCall } from '../types/index.js';

export type TextContent = {
  readonly kind: 'TEXT';
  readonly text: string;
};

export type ToolUseContent = {
  readonly kind: 'TOOL_USE';
  readonly id: string;
  readonly name: string;
  readonly input: Readonly<Record<string, unknown>>;
};

export type ContentBlock = TextContent | ToolUseContent;

export type ParseableResponse = Pick<CompletionResponse, 'content'>;

/** Called for each tool_use block that had to be skipped. */
export type InvalidBlockHandler = (reason: string, block: unknown) => void;

const TypedBlockSchema = z.object({ type: z.string() });

const TextBlockSchema = z.object({
  type: z.literal('text'),
  text: z.string().nullish(),
});

const ToolUseBlockSchema = z.object({
  type: z.literal('tool_use'),
  id: z.string().min(1),
  name: z.string().min(1),
  input: z.unknown().optional(),
});

const InputObjectSchema = z.record(z.string(), z.unknown());

function blockType(block: unknown): string | null {
  const result = TypedBlockSchema.safeParse(block);
  return result.success ? result.data.type : null;
}

export function hasToolCalls(response: ParseableResponse): boolean {
  const { content } = response;
  if (!Array.isArray(content)) {
    return false;
  }
  return content.some((block) => blockType(block) === 'tool_use');
}

/**
 * Input arrives as an object, or as a JSON string from backends that
 * stream arguments. Undecodable strings are kept under `raw_input`.
 */
function normalizeInput(input: unknown): Readonly<Record<string, unknown>> | null {
  if (input === undefined || input === null) {
    return {};
  }

  if (typeof input === 'string') {
    try {
      const decoded: unknown = JSON.parse(input);
      const asObject = InputObjectSchema.safeParse(decoded);
      if (asObject.success && !Array.isArray(decoded)) {
        return asObject.data;
      }
    } catch {
      // fall through to raw_input
    }
    return { raw_input: input };
  }

  const asObject = InputObjectSchema.safeParse(input);
  if (asObject.success && !Array.isArray(input)) {
    return asObject.data;
  }
  return null;
}

export function normalizeContent(
  response: ParseableResponse,
  onInvalid?: InvalidBlockHandler,
): ReadonlyArray<ContentBlock> {
  const { content } = response;

  if (typeof content === 'string') {
    return [{ kind: 'TEXT', text: content }];
  }
  if (!Array.isArray(content)) {
    return [];
  }

  const blocks: Array<ContentBlock> = [];

  for (const block of content) {
    switch (blockType(block)) {
      case 'text': {
        const text = TextBlockSchema.safeParse(block);
        if (text.success) {
          blocks.push({ kind: 'TEXT', text: text.data.text ?? '' });
        }
        break;
      }

      case 'tool_use': {
        const toolUse = ToolUseBlockSchema.safeParse(block);
        if (!toolUse.success) {
          onInvalid?.('tool_use block is missing id or name', block);
          break;
        }
        const input = normalizeInput(toolUse.data.input);
        if (input === null) {
          onInvalid?.(`tool_use block '${toolUse.data.id}' has non-object input`, block);
          break;
        }
        blocks.push({
          kind: 'TOOL_USE',
          id: toolUse.data.id,
          name: toolUse.data.name,
          input,
        });
        break;
      }

      default:
        // Other block kinds (thinking, images, ...) carry nothing the loop acts on.
        break;
    }
  }

  return blocks;
}

export function parseResponse(
  response: ParseableResponse,
  onInvalid?: InvalidBlockHandler,
): ReadonlyArray<ToolCall> {
  return normalizeContent(response, onInvalid)
    .filter((block): block is ToolUseContent => block.kind === 'TOOL_USE')
    .map((block) => ({
      id: block.id,
      name: block.name,
      input: block.input,
    }));
}

export function extractTextContent(response: ParseableResponse): string {
  if (typeof response.content === 'string') {
    return response.content;
  }

  return normalizeContent(response)
    .filter((block): block is TextContent => block.kind === 'TEXT' && block.text.length > 0)
    .map((block) => block.text)
    .join('\n');
}
