import type { TaskStatus } from './types.js';

export class CursorConflictError extends Error {
  constructor(
    readonly agentId: string,
    readonly expectedCursor: number,
    readonly actualCursor: number
  ) {
    super(`Cursor for agent "${agentId}" moved from ${expectedCursor} to ${actualCursor} during the run`);
    this.name = 'CursorConflictError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly taskId: string,
    readonly from: TaskStatus,
    readonly to: TaskStatus,
    reason?: string
  ) {
    super(`Task ${taskId} cannot move from ${from} to ${to}${reason ? `: ${reason}` : ''}`);
    this.name = 'InvalidTransitionError';
  }
}

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}
