import type { AgentEvent, AgentEventListener } from '../types/index.js';

export type AgentEventStream = AgentEventListener & {
  readonly complete: () => void;
  readonly error: (err: Error) => void;
  readonly iterator: () => AsyncIterable<AgentEvent>;
};

type PendingRead = {
  readonly resolve: (result: IteratorResult<AgentEvent>) => void;
  readonly reject: (err: Error) => void;
};

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/**
 * Listener that hands events to `for await` consumers. Events nobody is
 * waiting for are queued until read. After `complete()` or `error()` new
 * events are dropped; readers drain the queue first, then see the end of
 * the stream (or the error, once).
 */
export function createEventStream(): AgentEventStream {
  const queued: Array<AgentEvent> = [];
  const readers: Array<PendingRead> = [];
  let closed = false;
  let failure: Error | null = null;

  const settleReaders = (): void => {
    if (!closed) {
      return;
    }
    for (const reader of readers.splice(0)) {
      if (failure) {
        reader.reject(failure);
        failure = null;
      } else {
        reader.resolve(DONE);
      }
    }
  };

  const read = (): Promise<IteratorResult<AgentEvent>> => {
    const next = queued.shift();
    if (next !== undefined) {
      return Promise.resolve({ value: next, done: false });
    }
    if (closed) {
      if (failure) {
        const err = failure;
        failure = null;
        return Promise.reject(err);
      }
      return Promise.resolve(DONE);
    }
    return new Promise((resolve, reject) => {
      readers.push({ resolve, reject });
    });
  };

  return {
    onEvent(event: AgentEvent): void {
      if (closed) {
        return;
      }
      const reader = readers.shift();
      if (reader) {
        reader.resolve({ value: event, done: false });
      } else {
        queued.push(event);
      }
    },

    complete(): void {
      closed = true;
      settleReaders();
    },

    error(err: Error): void {
      if (closed) {
        return;
      }
      closed = true;
      failure = err;
      settleReaders();
    },

    iterator: () => ({
      [Symbol.asyncIterator]: () => ({ next: read }),
    }),
  };
}
