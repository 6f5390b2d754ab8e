import { TaskStatus } from '@libs/entities';

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  // queued -> queued rewrites the waiting message; queued -> failed covers
  // runs that fail before their first progress report.
  [TaskStatus.Queued]: [
    TaskStatus.Queued,
    TaskStatus.Processing,
    TaskStatus.Failed,
  ],
  [TaskStatus.Processing]: [
    TaskStatus.Processing,
    TaskStatus.Completed,
    TaskStatus.Failed,
  ],
  [TaskStatus.Completed]: [],
  [TaskStatus.Failed]: [],
};

export function isTerminalStatus(status: TaskStatus): boolean {
  return status === TaskStatus.Completed || status === TaskStatus.Failed;
}

export function isTransitionAllowed(
  from: TaskStatus,
  to: TaskStatus,
): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * `startedAt` belongs to the queued -> processing edge and nothing else.
 */
export function isStartEdge(from: TaskStatus, to: TaskStatus): boolean {
  return from === TaskStatus.Queued && to === TaskStatus.Processing;
}
