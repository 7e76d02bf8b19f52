export { Runtime, setupGracefulShutdown, type RuntimeOptions } from './runtime.js';
export { formatHistory, formatTaskTree } from './report.js';
