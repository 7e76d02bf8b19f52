import type { TaskStatus } from './types.js';

type StatusTransitions = {
  [K in TaskStatus]: readonly TaskStatus[];
};

export const validTransitions: StatusTransitions = {
  pending: ['running', 'cancelled'],
  running: ['succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  cancelled: [],
} as const;

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return validTransitions[from].includes(to);
}

export function isTerminal(status: TaskStatus): boolean {
  return validTransitions[status].length === 0;
}
