export type {
  AgentDefinition,
  AgentRunResult,
  RunFailure,
  RunFailureKind,
  RunOptions,
  RunStatus,
  ToolInvocationRecord,
} from './types.js';
export { RunError } from './errors.js';
export { AgentCatalog, workerAgentId, templateIdOf } from './catalog.js';
export { DEFAULT_RETRY_POLICY, computeBackoffDelay, type RetryPolicy } from './retry.js';
export { appendTurn, buildModelMessages } from './format.js';
export {
  NullOutputChannel,
  StreamOutputChannel,
  emitSafely,
  type OutputChannel,
  type StreamOutputChannelOptions,
} from './output.js';
export { AgentRunner, DEFAULT_MAX_TOOL_ROUND_TRIPS, type AgentRunnerOptions } from './runner.js';
export {
  AgentQueue,
  type AgentLaneStatus,
  type AgentQueueOptions,
  type RunCompleteListener,
  type RunExecutor,
} from './agent-queue.js';
