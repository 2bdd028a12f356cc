export * from './tool.js';
export * from './config.js';
export * from './event.js';
export * from './result.js';
export * from './error.js';
