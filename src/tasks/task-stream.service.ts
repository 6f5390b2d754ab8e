import { Inject, Injectable, Optional } from '@nestjs/common';

import { TasksConfigService } from '@libs/config';
import type { Task } from '@libs/entities';

import type { MetricsService } from '../metrics';
import { TaskEventsRegistry } from './events';
import { isTerminalEvent, type TaskStreamMessage } from './interfaces';
import { isTerminalStatus } from './task-state-machine';
import { TasksService, eventFromTask } from './tasks.service';

type StreamMetrics = Pick<
  MetricsService,
  'recordStreamAttached' | 'recordStreamDetached'
>;

/**
 * Relays a task's events to one observer, from a snapshot of its current
 * state up to and including its terminal event.
 */
@Injectable()
export class TaskStreamService {
  constructor(
    private readonly tasksService: TasksService,
    private readonly registry: TaskEventsRegistry,
    private readonly config: TasksConfigService,
    @Optional()
    @Inject('MetricsService')
    private readonly metrics?: StreamMetrics,
  ) {}

  /**
   * Checks ownership up front so the caller can refuse the stream before
   * it starts.
   *
   * @throws TaskNotFoundError
   */
  public async attach(
    taskId: string,
    owner: string,
    signal?: AbortSignal,
  ): Promise<AsyncGenerator<TaskStreamMessage, void, undefined>> {
    const task = await this.tasksService.getOwned(taskId, owner);
    return this.relay(task, signal);
  }

  private async *relay(
    task: Task,
    signal?: AbortSignal,
  ): AsyncGenerator<TaskStreamMessage, void, undefined> {
    if (isTerminalStatus(task.status)) {
      yield eventFromTask(task);
      return;
    }

    // Subscribe before re-reading: a terminal event published after the
    // re-read lands in the buffer, one committed before it shows up in the
    // row. Either way it is sent exactly once.
    const subscription = this.registry.subscribe(task.taskId);
    this.metrics?.recordStreamAttached();
    let finished = false;

    try {
      const current = await this.tasksService.get(task.taskId);
      if (!current) {
        return;
      }

      yield eventFromTask(current);
      if (isTerminalStatus(current.status)) {
        finished = true;
        return;
      }

      const keepaliveMs = this.config.streamKeepaliveMs;
      while (true) {
        const read = await subscription.read(keepaliveMs, signal);
        if (read.kind === 'closed') {
          if (signal?.aborted) {
            return;
          }
          // Closed under us: the task was deleted, or its terminal event
          // did not fit in this observer's buffer.
          const latest = await this.tasksService.get(task.taskId);
          if (latest && isTerminalStatus(latest.status)) {
            yield eventFromTask(latest);
            finished = true;
          }
          return;
        }
        if (read.kind === 'idle') {
          yield { type: 'ping' };
          continue;
        }

        yield read.event;
        if (isTerminalEvent(read.event)) {
          finished = true;
          return;
        }
      }
    } finally {
      this.registry.unsubscribe(task.taskId, subscription, finished);
      this.metrics?.recordStreamDetached();
    }
  }
}
