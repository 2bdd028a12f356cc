import type { AgentEvent, AgentEventListener } from '../types/index.js';
import type { Logger } from '../logging/logger.js';

export type EventInit = Omit<AgentEvent, 'timestamp' | 'data'> & {
  readonly data?: Readonly<Record<string, unknown>>;
};

export type EventDispatcher = {
  readonly emit: (init: EventInit) => void;
};

/**
 * Stamps events and hands them to the listener synchronously. A throwing
 * listener is logged and otherwise ignored.
 */
export function createEventDispatcher(
  listener: AgentEventListener | undefined,
  logger: Logger,
  now: () => Date = () => new Date(),
): EventDispatcher {
  return {
    emit(init: EventInit): void {
      if (!listener) {
        return;
      }

      const event: AgentEvent = {
        ...init,
        data: init.data ?? {},
        timestamp: now().toISOString(),
      };

      try {
        listener.onEvent(event);
      } catch (error) {
        logger.warn({ err: error, eventType: event.type }, 'event listener threw');
      }
    },
  };
}
