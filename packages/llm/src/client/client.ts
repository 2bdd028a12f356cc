import type {
  CompletionBackend,
  CompletionRequest,
  CompletionResponse,
  Middleware,
} from '../types/index.js';
import { executeMiddlewareChain } from './middleware.js';

export type ClientConfig = {
  readonly backend: CompletionBackend;
  readonly defaultModel?: string;
  readonly middleware?: ReadonlyArray<Middleware>;
};

/**
 * A completion backend that wraps another one, filling in the default model
 * and running every request through the configured middleware.
 */
export class Client implements CompletionBackend {
  private readonly backend: CompletionBackend;
  private readonly defaultModel: string | null;
  private readonly middlewares: ReadonlyArray<Middleware>;

  constructor(config: ClientConfig) {
    this.backend = config.backend;
    this.defaultModel = config.defaultModel ?? null;
    this.middlewares = config.middleware ?? [];
  }

  complete(request: CompletionRequest): Promise<CompletionResponse> {
    const resolved: CompletionRequest =
      request.model === undefined && this.defaultModel !== null
        ? { ...request, model: this.defaultModel }
        : request;

    const handler = (req: CompletionRequest) => this.backend.complete(req);
    return executeMiddlewareChain(this.middlewares, resolved, handler);
  }

  use(middleware: Middleware): Client {
    return new Client({
      backend: this.backend,
      ...(this.defaultModel !== null ? { defaultModel: this.defaultModel } : {}),
      middleware: [...this.middlewares, middleware],
    });
  }
}
