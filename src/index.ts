// Agent Conductor
// Main entry point for library usage

export * from './config/index.js';
export * from './providers/index.js';
export * from './tools/index.js';
export * from './store/index.js';
export * from './agent/index.js';
export * from './orchestrator/index.js';
export * from './runtime/index.js';
export * from './utils/index.js';
