import type { CompletionRequest, CompletionResponse, Middleware } from '../types/index.js';

export function executeMiddlewareChain(
  middlewares: ReadonlyArray<Middleware>,
  request: CompletionRequest,
  handler: (request: CompletionRequest) => Promise<CompletionResponse>,
): Promise<CompletionResponse> {
  // Onion order: the first-registered middleware sees the request first
  // and the response last.
  let chain: (request: CompletionRequest) => Promise<CompletionResponse> = handler;

  for (let i = middlewares.length - 1; i >= 0; i--) {
    const mw = middlewares[i];
    if (!mw) continue;
    const nextChain = chain;

    chain = (request: CompletionRequest) => mw(request, nextChain);
  }

  return chain(request);
}
