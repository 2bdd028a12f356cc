import { describe, it, expect } from 'vitest';
import {
  Client,
  userMessage,
  type CompletionBackend,
  type CompletionRequest,
  type CompletionResponse,
  type Middleware,
} from '@toolloop/llm';
import {
  createAgentLoop,
  createEventStream,
  createLogger,
  createMetricsTracker,
  createTool,
  createToolRegistry,
  type AgentEvent,
} from '../../src/index.js';

const logger = createLogger({ level: 'silent' });

const FILES: Readonly<Record<string, ReadonlyArray<string>>> = {
  '/workspace': ['README.md', 'package.json', 'src'],
};

const listFiles = createTool({
  name: 'list_files',
  description: 'List the entries of a directory',
  parameters: [{ name: 'path', type: 'string', description: 'Directory to list' }],
  handler: async (input) => {
    const path = String(input['path']);
    const entries = FILES[path];
    if (!entries) {
      return { output: '', error: `No such directory: ${path}`, isError: true };
    }
    return entries.join('\n');
  },
});

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Asks for list_files once, then summarizes whatever came back. */
function fileAssistant(): CompletionBackend {
  return {
    async complete(request: CompletionRequest): Promise<CompletionResponse> {
      const last = request.messages[request.messages.length - 1];
      if (last && Array.isArray(last.content) && last.content.some(isToolResult)) {
        return { content: [{ type: 'text', text: 'The workspace holds 3 entries.' }], stopReason: 'end_turn' };
      }
      return {
        content: [
          { type: 'text', text: 'Let me look.' },
          { type: 'tool_use', id: 'toolu_ls', name: 'list_files', input: { path: '/workspace' } },
        ],
        stopReason: 'tool_use',
      };
    },
  };
}

function isToolResult(block: unknown): boolean {
  return typeof block === 'object' && block !== null && 'type' in block && block.type === 'tool_result';
}

describe('agent loop end to end', () => {
  it('lists files through a tool and answers', async () => {
    const stream = createEventStream();
    const metrics = createMetricsTracker();
    const loop = createAgentLoop({
      backend: fileAssistant(),
      registry: createToolRegistry([listFiles]),
      config: { approvalMode: 'auto' },
      listener: stream,
      metrics,
      logger,
    });

    const result = await loop.run([userMessage('What is in /workspace?')]);
    stream.complete();

    const events: Array<AgentEvent> = [];
    for await (const event of stream.iterator()) {
      events.push(event);
    }

    expect(result).toEqual({
      success: true,
      finalResponse: 'The workspace holds 3 entries.',
      iterations: 2,
      toolCallsMade: [{ id: 'toolu_ls', name: 'list_files', input: { path: '/workspace' } }],
      toolResults: [{ toolCallId: 'toolu_ls', output: 'README.md\npackage.json\nsrc', isError: false }],
      stoppedReason: 'completed',
    });
    expect(events.map((e) => e.type)).toEqual([
      'ITERATION_START',
      'AI_RESPONSE',
      'TOOL_START',
      'TOOL_COMPLETE',
      'ITERATION_END',
      'ITERATION_START',
      'AI_RESPONSE',
      'AGENT_COMPLETE',
    ]);
    expect(metrics.getMostUsedTools()).toEqual([['list_files', 1]]);
  });

  it('runs the tool calls of one turn concurrently', async () => {
    const sleeper = createTool({
      name: 'sleep',
      description: 'Sleeps for the given milliseconds',
      parameters: [{ name: 'ms', type: 'integer', description: 'Delay' }],
      handler: async (input) => {
        const ms = Number(input['ms']);
        await sleep(ms);
        return `slept ${ms}`;
      },
    });
    let turn = 0;
    const backend: CompletionBackend = {
      async complete() {
        turn++;
        if (turn > 1) {
          return { content: 'all done' };
        }
        return {
          content: [
            { type: 'tool_use', id: 'a', name: 'sleep', input: { ms: 300 } },
            { type: 'tool_use', id: 'b', name: 'sleep', input: { ms: 100 } },
            { type: 'tool_use', id: 'c', name: 'sleep', input: { ms: 200 } },
          ],
        };
      },
    };
    const loop = createAgentLoop({
      backend,
      registry: createToolRegistry([sleeper]),
      config: { approvalMode: 'auto' },
      logger,
    });

    const started = Date.now();
    const result = await loop.run([userMessage('nap')]);
    const elapsed = Date.now() - started;

    expect(result.success).toBe(true);
    expect(result.toolResults.map((r) => r.output)).toEqual(['slept 300', 'slept 100', 'slept 200']);
    expect(elapsed).toBeGreaterThanOrEqual(290);
    expect(elapsed).toBeLessThan(550);
  });

  it('drives a middleware-wrapped client as the backend', async () => {
    const seenModels: Array<string | undefined> = [];
    const recordModel: Middleware = async (request, next) => {
      seenModels.push(request.model);
      return next(request);
    };
    const client = new Client({ backend: fileAssistant(), defaultModel: 'test-model' }).use(recordModel);
    const loop = createAgentLoop({
      backend: client,
      registry: createToolRegistry([listFiles]),
      config: { approvalMode: 'auto' },
      logger,
    });

    const result = await loop.run([userMessage('What is in /workspace?')]);

    expect(result.stoppedReason).toBe('completed');
    expect(seenModels).toEqual(['test-model', 'test-model']);
  });
});
