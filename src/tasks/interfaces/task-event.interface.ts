import type { TaskOutputs, TaskStatus } from '@libs/entities';

export interface TaskProgressEvent {
  type: 'progress';
  status: TaskStatus.Queued | TaskStatus.Processing;
  progress: number;
  message: string;
}

export interface TaskCompleteEvent {
  type: 'complete';
  status: TaskStatus.Completed;
  progress: number;
  message: string;
  outputs: TaskOutputs;
}

export interface TaskErrorEvent {
  type: 'error';
  status: TaskStatus.Failed;
  progress: number;
  message: string;
  error: string;
}

/**
 * What a task's event channel carries, in publish order.
 */
export type TaskEvent = TaskProgressEvent | TaskCompleteEvent | TaskErrorEvent;

export type TaskTerminalEvent = TaskCompleteEvent | TaskErrorEvent;

/**
 * Sent on an idle stream to keep intermediaries from closing it. Never
 * published on a channel.
 */
export interface TaskKeepaliveMessage {
  type: 'ping';
}

export type TaskStreamMessage = TaskEvent | TaskKeepaliveMessage;

export const isTerminalEvent = (event: TaskEvent): event is TaskTerminalEvent =>
  event.type === 'complete' || event.type === 'error';
