export * from './content.js';
export * from './message.js';
export * from './tool.js';
export * from './backend.js';
export * from './error.js';
