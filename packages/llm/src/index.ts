// @toolloop/llm: completion backend contract and client plumbing

export * from './types/index.js';
export { Client, type ClientConfig } from './client/client.js';
export { executeMiddlewareChain } from './client/middleware.js';
export { withDeadline } from './utils/deadline.js';
