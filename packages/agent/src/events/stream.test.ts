import { describe, it, expect } from 'vitest';
import { createEventStream } from './stream.js';
import type { AgentEvent, AgentEventType } from '../types/index.js';

function event(type: AgentEventType, iteration = 1): AgentEvent {
  return { type, iteration, message: type, data: {}, timestamp: '2026-01-01T00:00:00.000Z' };
}

async function collect(iterable: AsyncIterable<AgentEvent>): Promise<AgentEventType[]> {
  const types: AgentEventType[] = [];
  for await (const e of iterable) {
    types.push(e.type);
  }
  return types;
}

describe('createEventStream', () => {
  it('yields events buffered before iteration starts', async () => {
    const stream = createEventStream();
    stream.onEvent(event('ITERATION_START'));
    stream.onEvent(event('AGENT_COMPLETE'));
    stream.complete();

    await expect(collect(stream.iterator())).resolves.toEqual(['ITERATION_START', 'AGENT_COMPLETE']);
  });

  it('delivers events to a reader that is already waiting', async () => {
    const stream = createEventStream();
    const collected = collect(stream.iterator());

    stream.onEvent(event('ITERATION_START'));
    await Promise.resolve();
    stream.onEvent(event('ITERATION_END'));
    await Promise.resolve();
    stream.complete();

    await expect(collected).resolves.toEqual(['ITERATION_START', 'ITERATION_END']);
  });

  it('ends iteration on complete with an empty buffer', async () => {
    const stream = createEventStream();
    stream.complete();

    await expect(collect(stream.iterator())).resolves.toEqual([]);
  });

  it('drops events emitted after complete', async () => {
    const stream = createEventStream();
    stream.onEvent(event('ITERATION_START'));
    stream.complete();
    stream.onEvent(event('ITERATION_END'));

    await expect(collect(stream.iterator())).resolves.toEqual(['ITERATION_START']);
  });

  it('rejects a waiting reader on error', async () => {
    const stream = createEventStream();
    const collected = collect(stream.iterator());

    stream.error(new Error('front-end closed'));

    await expect(collected).rejects.toThrow('front-end closed');
  });

  it('rejects the next read when the error arrives before anyone reads', async () => {
    const stream = createEventStream();
    stream.error(new Error('early failure'));

    await expect(collect(stream.iterator())).rejects.toThrow('early failure');
  });

  it('reports the error only once, then ends', async () => {
    const stream = createEventStream();
    stream.error(new Error('gone'));
    const iterator = stream.iterator()[Symbol.asyncIterator]();

    await expect(iterator.next()).rejects.toThrow('gone');
    await expect(iterator.next()).resolves.toEqual({ done: true, value: undefined });
  });

  it('serves several waiting readers in order', async () => {
    const stream = createEventStream();
    const iterator = stream.iterator()[Symbol.asyncIterator]();
    const first = iterator.next();
    const second = iterator.next();

    stream.onEvent(event('TOOL_START'));
    stream.complete();

    await expect(first).resolves.toMatchObject({ done: false, value: { type: 'TOOL_START' } });
    await expect(second).resolves.toEqual({ done: true, value: undefined });
  });
});
