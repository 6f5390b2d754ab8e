import {
  isTerminalEvent,
  type TaskEvent,
} from '../interfaces/task-event.interface';

export type ChannelRead =
  | { kind: 'event'; event: TaskEvent }
  | { kind: 'idle' }
  | { kind: 'closed' };

export interface PublishResult {
  delivered: number;
  dropped: number;
}

/**
 * One observer's bounded view of a task channel. Single reader.
 */
export class TaskEventSubscription {
  private readonly buffer: TaskEvent[] = [];
  private waiting: ((read: ChannelRead) => void) | null = null;
  private closed = false;

  constructor(private readonly capacity: number) {}

  public get isClosed(): boolean {
    return this.closed;
  }

  public get size(): number {
    return this.buffer.length;
  }

  /**
   * Hands the event to a waiting reader or buffers it. Never blocks; a full
   * buffer rejects the event.
   */
  public offer(event: TaskEvent): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiting) {
      const deliver = this.waiting;
      this.waiting = null;
      deliver({ kind: 'event', event });
      return true;
    }

    if (this.buffer.length >= this.capacity) {
      return false;
    }

    this.buffer.push(event);
    return true;
  }

  /**
   * Resolves with the next event, with `idle` once `idleMs` pass without
   * one, or with `closed` when the subscription closes or `signal` aborts.
   * Buffered events are drained before `closed` is reported.
   */
  public read(idleMs: number, signal?: AbortSignal): Promise<ChannelRead> {
    const buffered = this.buffer.shift();
    if (buffered) {
      return Promise.resolve({ kind: 'event', event: buffered });
    }

    if (this.closed || signal?.aborted) {
      return Promise.resolve({ kind: 'closed' });
    }

    if (this.waiting) {
      return Promise.reject(
        new Error('Task event subscription already has a pending read'),
      );
    }

    return new Promise<ChannelRead>((resolve) => {
      const settle = (read: ChannelRead) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiting === settle) {
          this.waiting = null;
        }
        resolve(read);
      };
      const onAbort = () => settle({ kind: 'closed' });
      const timer = setTimeout(() => settle({ kind: 'idle' }), idleMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiting = settle;
    });
  }

  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    if (this.waiting) {
      const deliver = this.waiting;
      this.waiting = null;
      deliver({ kind: 'closed' });
    }
  }
}

/**
 * Fan-out channel for one task: every published event is offered to every
 * attached subscription.
 */
export class TaskEventChannel {
  private readonly subscriptions = new Set<TaskEventSubscription>();
  private terminal = false;

  constructor(
    public readonly taskId: string,
    private readonly capacity: number,
  ) {}

  public get isTerminal(): boolean {
    return this.terminal;
  }

  public get subscriberCount(): number {
    return this.subscriptions.size;
  }

  public subscribe(): TaskEventSubscription {
    const subscription = new TaskEventSubscription(this.capacity);
    this.subscriptions.add(subscription);
    return subscription;
  }

  /**
   * Records that the task reached a terminal state without this channel
   * carrying the event, e.g. a channel opened by a late observer.
   */
  public markTerminal(): void {
    this.terminal = true;
  }

  public unsubscribe(subscription: TaskEventSubscription): void {
    this.subscriptions.delete(subscription);
    subscription.close();
  }

  public publish(event: TaskEvent): PublishResult {
    if (isTerminalEvent(event)) {
      this.terminal = true;
    }

    const result: PublishResult = { delivered: 0, dropped: 0 };
    for (const subscription of this.subscriptions) {
      if (subscription.offer(event)) {
        result.delivered += 1;
        continue;
      }
      result.dropped += 1;
      // A reader that missed the end learns it from `closed` once its
      // buffer drains.
      if (isTerminalEvent(event)) {
        subscription.close();
      }
    }
    return result;
  }

  public close(): void {
    for (const subscription of this.subscriptions) {
      subscription.close();
    }
    this.subscriptions.clear();
  }
}
