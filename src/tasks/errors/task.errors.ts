import { TaskStatus } from '@libs/entities';

/**
 * Rejected input: a progress value out of range or a configuration the
 * engine cannot run with. Raised before anything is written.
 */
export class TaskValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TaskValidationError';
  }
}

/**
 * The task does not exist or belongs to someone else.
 */
export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

/**
 * A transition the state machine does not allow, such as updating a task
 * that already reached a terminal state.
 */
export class TaskStateError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly from: TaskStatus,
    public readonly to: TaskStatus | 'deleted',
  ) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = 'TaskStateError';
  }
}

/**
 * The translation engine reported an error, crashed, or produced output
 * that could not be understood. The message is the engine's own detail.
 */
export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}
