import { AbortError, RequestTimeoutError } from '../types/error.js';

/**
 * Runs `fn` under a hard deadline. The signal handed to `fn` aborts when the
 * deadline passes or when `externalSignal` aborts, and the returned promise
 * settles at that moment even if `fn` ignores its signal.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  externalSignal?: AbortSignal,
): Promise<T> {
  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const controller = new AbortController();

  let rejectExpiry: (error: Error) => void = () => {};
  const expiry = new Promise<never>((_, reject) => {
    rejectExpiry = reject;
  });

  const timeoutId = setTimeout(() => {
    controller.abort();
    rejectExpiry(new RequestTimeoutError(`Request timed out after ${timeoutMs}ms`, timeoutMs));
  }, timeoutMs);

  const onExternalAbort = (): void => {
    controller.abort();
    rejectExpiry(new AbortError('Request was aborted'));
  };
  externalSignal?.addEventListener('abort', onExternalAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), expiry]);
  } finally {
    clearTimeout(timeoutId);
    externalSignal?.removeEventListener('abort', onExternalAbort);
  }
}
