import { Inject, Injectable, Logger, Optional } from '@nestjs/common';

import { TasksConfigService } from '@libs/config';

import type { MetricsService } from '../../metrics';
import {
  isTerminalEvent,
  type TaskEvent,
} from '../interfaces/task-event.interface';
import {
  TaskEventChannel,
  type TaskEventSubscription,
} from './task-event-channel';

/**
 * Task id -> live event channel.
 *
 * Ownership: `TasksService.create` opens a channel, an observer may open one
 * lazily by subscribing first. A channel is dropped when its task is
 * terminal and no observer is left, or when the task is deleted. All
 * methods are synchronous, so lookups and removals never interleave.
 */
@Injectable()
export class TaskEventsRegistry {
  private readonly logger = new Logger(TaskEventsRegistry.name);
  private readonly channels = new Map<string, TaskEventChannel>();

  constructor(
    private readonly config: TasksConfigService,
    @Optional()
    @Inject('MetricsService')
    private readonly metrics?: Pick<MetricsService, 'recordTaskEventsDropped'>,
  ) {}

  public get size(): number {
    return this.channels.size;
  }

  public has(taskId: string): boolean {
    return this.channels.has(taskId);
  }

  public open(taskId: string): TaskEventChannel {
    let channel = this.channels.get(taskId);
    if (!channel) {
      channel = new TaskEventChannel(taskId, this.config.channelCapacity);
      this.channels.set(taskId, channel);
    }
    return channel;
  }

  public subscribe(taskId: string): TaskEventSubscription {
    return this.open(taskId).subscribe();
  }

  /**
   * Detaches an observer. `taskFinished` tells the registry the observer
   * saw the task terminal in the store, so the channel can go once empty.
   */
  public unsubscribe(
    taskId: string,
    subscription: TaskEventSubscription,
    taskFinished = false,
  ): void {
    const channel = this.channels.get(taskId);
    if (!channel) {
      subscription.close();
      return;
    }

    channel.unsubscribe(subscription);
    if (taskFinished) {
      channel.markTerminal();
    }
    this.releaseIfDone(channel);
  }

  /**
   * Best-effort delivery. Never throws and never waits: an observer whose
   * buffer is full misses this event, which is logged.
   *
   * @returns the number of observers that received the event.
   */
  public publish(taskId: string, event: TaskEvent): number {
    const channel = this.channels.get(taskId);
    if (!channel) {
      return 0;
    }

    const { delivered, dropped } = channel.publish(event);
    if (dropped > 0) {
      this.metrics?.recordTaskEventsDropped(event.type, dropped);
      this.logger.warn(
        `Event channel full for task ${taskId}, dropped ${event.type} event for ${dropped} observer(s)`,
      );
    }

    if (isTerminalEvent(event)) {
      this.releaseIfDone(channel);
    }
    return delivered;
  }

  public discard(taskId: string): void {
    const channel = this.channels.get(taskId);
    if (!channel) {
      return;
    }
    channel.close();
    this.channels.delete(taskId);
  }

  private releaseIfDone(channel: TaskEventChannel): void {
    if (
      channel.isTerminal &&
      channel.subscriberCount === 0 &&
      this.channels.get(channel.taskId) === channel
    ) {
      this.channels.delete(channel.taskId);
    }
  }
}
