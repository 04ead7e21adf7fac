export * from './types.js';
export * from './base-agent.js';
export * from './concurrency.js';
export * from './console-log.js';
