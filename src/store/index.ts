export type {
  AgentState,
  AgentStore,
  CursorCommit,
  MessageContent,
  MessageRole,
  NewTask,
  ReplyMessage,
  StoredMessage,
  TaskError,
  TaskNode,
  TaskRecord,
  TaskStatus,
  TaskUpdate,
} from './types.js';
export { CursorConflictError, InvalidTransitionError, TaskNotFoundError } from './errors.js';
export { canTransition, isTerminal, validTransitions } from './task-transitions.js';
export { SqliteAgentStore } from './sqlite-store.js';
