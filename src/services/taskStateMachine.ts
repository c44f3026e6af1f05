import { TransitionError } from '../utils/appError';
import type { TaskStatus } from '../types';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(taskId: string, from: TaskStatus, to: TaskStatus): void {
  if (canTransition(from, to)) return;

  const reason = isTerminalStatus(from)
    ? `task is already ${from}`
    : `allowed from ${from}: ${TRANSITIONS[from].join(', ')}`;
  throw new TransitionError(`Task ${taskId} cannot move from ${from} to ${to} (${reason})`);
}

/**
 * Statuses a task passes through when a result settles it. A result for a task the
 * drone never acknowledged counts as the acknowledgement.
 */
export function settlementPath(taskId: string, from: TaskStatus, success: boolean): TaskStatus[] {
  const target: TaskStatus = success ? 'completed' : 'failed';
  const path: TaskStatus[] = from === 'pending' && success ? ['processing', target] : [target];

  let current = from;
  for (const next of path) {
    assertTransition(taskId, current, next);
    current = next;
  }
  return path;
}
