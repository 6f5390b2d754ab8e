import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { randomUUID } from 'crypto';

import {
  Task,
  TaskOutputs,
  TaskSettingsSnapshot,
  TaskStatus,
  TaskTokenUsage,
} from '@libs/entities';
import { TasksRepository } from '@libs/repositories';

import type { MetricsService } from '../metrics';
import { StorageService } from '../storage';
import {
  TaskNotFoundError,
  TaskStateError,
  TaskValidationError,
} from './errors';
import { TaskEventsRegistry } from './events';
import type {
  TaskCompleteEvent,
  TaskErrorEvent,
  TaskEvent,
  TaskProgressEvent,
  TaskView,
} from './interfaces';
import {
  isStartEdge,
  isTerminalStatus,
  isTransitionAllowed,
} from './task-state-machine';

type TaskMetrics = Pick<
  MetricsService,
  | 'recordTaskCreated'
  | 'recordTaskCompleted'
  | 'recordTaskFailed'
  | 'recordTaskStatusChange'
  | 'recordTokenUsage'
>;

export interface CreateTaskInput {
  owner: string;
  fileId: string | null;
  displayName: string;
  settingsSnapshot: TaskSettingsSnapshot;
}

export const QUEUED_MESSAGE = 'Translation queued';
export const COMPLETED_MESSAGE = 'Translation completed';

export const failureMessage = (error: string): string =>
  `Translation failed: ${error}`;

export function toTaskView(task: Task): TaskView {
  return {
    taskId: task.taskId,
    status: task.status,
    progress: task.progress,
    message: task.message,
    fileId: task.fileId,
    displayName: task.displayName,
    outputs: task.outputs,
    error: task.error,
    createdAt: task.createdAt,
    startedAt: task.startedAt,
    completedAt: task.completedAt,
  };
}

/**
 * The event an observer should see for a task's persisted state: its
 * terminal event when finished, a progress snapshot otherwise.
 */
export function eventFromTask(task: Task): TaskEvent {
  switch (task.status) {
    case TaskStatus.Completed:
      return {
        type: 'complete',
        status: TaskStatus.Completed,
        progress: task.progress,
        message: task.message,
        outputs: task.outputs ?? {},
      };
    case TaskStatus.Failed:
      return {
        type: 'error',
        status: TaskStatus.Failed,
        progress: task.progress,
        message: task.message,
        error: task.error ?? 'Unknown error',
      };
    default:
      return {
        type: 'progress',
        status: task.status,
        progress: task.progress,
        message: task.message,
      };
  }
}

/**
 * Owns task state. Every transition is one store transaction; the event
 * is published to observers only after it commits.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    private readonly tasksRepo: TasksRepository,
    private readonly events: TaskEventsRegistry,
    private readonly storage: StorageService,
    @Optional()
    @Inject('MetricsService')
    private readonly metrics?: TaskMetrics,
  ) {}

  public async create(input: CreateTaskInput): Promise<string> {
    const taskId = randomUUID();

    await this.tasksRepo.create({
      taskId,
      owner: input.owner,
      status: TaskStatus.Queued,
      progress: 0,
      message: QUEUED_MESSAGE,
      fileId: input.fileId,
      displayName: input.displayName,
      settingsSnapshot: input.settingsSnapshot,
      outputs: null,
      error: null,
      tokenUsage: null,
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
    });

    this.events.open(taskId);
    this.metrics?.recordTaskCreated();
    this.logger.log(`Task ${taskId} created for ${input.owner}`);

    return taskId;
  }

  /**
   * Records progress. While processing the stored value never goes down.
   *
   * @throws TaskValidationError for a progress outside 0..100.
   * @throws TaskStateError when the task cannot move to `status`.
   */
  public async updateProgress(
    taskId: string,
    progress: number,
    message: string,
    status: TaskStatus.Queued | TaskStatus.Processing = TaskStatus.Processing,
  ): Promise<void> {
    if (!Number.isInteger(progress) || progress < 0 || progress > 100) {
      throw new TaskValidationError(
        `Progress must be an integer between 0 and 100, got ${progress}`,
      );
    }

    const { event, from } = await this.tasksRepo.withTransaction(
      async (manager) => {
        const task = this.assertTransition(
          taskId,
          status,
          await manager.findOne(Task, { where: { taskId } }),
        );
        const from = task.status;

        if (isStartEdge(from, status)) {
          task.startedAt = new Date();
        }
        task.status = status;
        task.progress =
          status === TaskStatus.Processing
            ? Math.max(task.progress, progress)
            : progress;
        task.message = message;
        await manager.save(task);

        const event: TaskProgressEvent = {
          type: 'progress',
          status,
          progress: task.progress,
          message,
        };
        return { event, from };
      },
    );

    if (from !== status) {
      this.metrics?.recordTaskStatusChange(status);
    }
    this.events.publish(taskId, event);
  }

  public async complete(
    taskId: string,
    outputs: TaskOutputs,
    tokenUsage: TaskTokenUsage | null = null,
  ): Promise<void> {
    const { event, task } = await this.tasksRepo.withTransaction(
      async (manager) => {
        const task = this.assertTransition(
          taskId,
          TaskStatus.Completed,
          await manager.findOne(Task, { where: { taskId } }),
        );

        task.status = TaskStatus.Completed;
        task.progress = 100;
        task.message = COMPLETED_MESSAGE;
        task.outputs = outputs;
        task.tokenUsage = tokenUsage;
        task.error = null;
        task.completedAt = new Date();
        await manager.save(task);

        const event: TaskCompleteEvent = {
          type: 'complete',
          status: TaskStatus.Completed,
          progress: 100,
          message: COMPLETED_MESSAGE,
          outputs,
        };
        return { event, task };
      },
    );

    this.metrics?.recordTaskCompleted(this.runSeconds(task));
    if (tokenUsage) {
      this.metrics?.recordTokenUsage(tokenUsage);
    }
    this.logger.log(`Task ${taskId} completed`);
    this.events.publish(taskId, event);
  }

  public async fail(taskId: string, error: string): Promise<void> {
    const message = failureMessage(error);
    const { event, task } = await this.tasksRepo.withTransaction(
      async (manager) => {
        const task = this.assertTransition(
          taskId,
          TaskStatus.Failed,
          await manager.findOne(Task, { where: { taskId } }),
        );

        task.status = TaskStatus.Failed;
        task.message = message;
        task.error = error;
        task.outputs = null;
        task.completedAt = new Date();
        await manager.save(task);

        const event: TaskErrorEvent = {
          type: 'error',
          status: TaskStatus.Failed,
          progress: task.progress,
          message,
          error,
        };
        return { event, task };
      },
    );

    this.metrics?.recordTaskFailed(this.runSeconds(task));
    this.logger.warn(`Task ${taskId} failed: ${error}`);
    this.events.publish(taskId, event);
  }

  public async get(taskId: string): Promise<Task | null> {
    return this.tasksRepo.findOneByTaskId(taskId);
  }

  /**
   * @throws TaskNotFoundError when the task is unknown or owned by someone
   * else; the two cases are indistinguishable to the caller.
   */
  public async getOwned(taskId: string, owner: string): Promise<Task> {
    const task = await this.tasksRepo.findOneByTaskId(taskId);
    if (!task || task.owner !== owner) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  public async listByOwner(owner: string): Promise<Task[]> {
    return this.tasksRepo.findByOwner(owner);
  }

  /**
   * Deletes a finished task with its outputs and source upload.
   *
   * @returns false when there is no such task for this owner.
   * @throws TaskStateError while the task is still queued or processing.
   */
  public async delete(taskId: string, owner: string): Promise<boolean> {
    const task = await this.tasksRepo.findOneByTaskId(taskId);
    if (!task || task.owner !== owner) {
      return false;
    }
    if (!isTerminalStatus(task.status)) {
      throw new TaskStateError(taskId, task.status, 'deleted');
    }

    await this.storage.removeTaskArtifacts(owner, taskId, task.fileId);
    const removed = await this.tasksRepo.remove(taskId);
    this.events.discard(taskId);

    if (removed) {
      this.logger.log(`Task ${taskId} deleted`);
    }
    return removed;
  }

  private assertTransition(
    taskId: string,
    to: TaskStatus,
    task: Task | null,
  ): Task {
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    if (!isTransitionAllowed(task.status, to)) {
      throw new TaskStateError(taskId, task.status, to);
    }
    return task;
  }

  private runSeconds(task: Task): number {
    const from = task.startedAt ?? task.createdAt;
    const to = task.completedAt ?? new Date();
    return Math.max(0, (to.getTime() - from.getTime()) / 1000);
  }
}
