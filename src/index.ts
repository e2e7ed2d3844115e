// runwarden — shell command execution and scheduling engine
export * from './core/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './commands/index.js';
export * from './execution/index.js';
export * from './scheduling/index.js';
export { createEngine } from './engine.js';
export type { Engine, EngineOptions } from './engine.js';
