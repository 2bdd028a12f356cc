// @toolloop/agent: iterative tool-using agent loop

export * from './types/index.js';
export * from './tools/tool.js';
export * from './tools/registry.js';
export * from './parser/response-parser.js';
export * from './approval/gate.js';
export * from './events/dispatcher.js';
export * from './events/stream.js';
export * from './metrics/tracker.js';
export * from './metrics/file-store.js';
export * from './config/run-config.js';
export * from './logging/logger.js';
export * from './loop/tool-execution.js';
export * from './loop/agent-loop.js';
