import { TasksConfigService } from '@libs/config';
import { TaskStatus } from '@libs/entities';

import { createTestConfigService } from '../../testing/test-data-source';
import type { TaskEvent } from '../interfaces';
import { TaskEventsRegistry } from './task-events.registry';

const progress: TaskEvent = {
  type: 'progress',
  status: TaskStatus.Processing,
  progress: 10,
  message: 'Layout (1/1, 1/2)',
};

const failed: TaskEvent = {
  type: 'error',
  status: TaskStatus.Failed,
  progress: 10,
  message: 'Translation failed: boom',
  error: 'boom',
};

function createRegistry(capacity = 100) {
  const metrics = { recordTaskEventsDropped: jest.fn() };
  const registry = new TaskEventsRegistry(
    new TasksConfigService(
      createTestConfigService({ tasks: { channelCapacity: String(capacity) } }),
    ),
    metrics,
  );
  return { registry, metrics };
}

describe('TaskEventsRegistry', () => {
  it('publishes to nobody when no channel is open', () => {
    const { registry } = createRegistry();
    expect(registry.publish('missing', progress)).toBe(0);
    expect(registry.has('missing')).toBe(false);
  });

  it('keeps a terminal channel until its last observer leaves', async () => {
    const { registry } = createRegistry();
    registry.open('t1');
    const subscription = registry.subscribe('t1');

    expect(registry.publish('t1', failed)).toBe(1);
    expect(registry.has('t1')).toBe(true);

    await expect(subscription.read(1000)).resolves.toEqual({
      kind: 'event',
      event: failed,
    });
    registry.unsubscribe('t1', subscription);
    expect(registry.has('t1')).toBe(false);
  });

  it('releases a terminal channel with no observers on publish', () => {
    const { registry } = createRegistry();
    registry.open('t1');

    registry.publish('t1', failed);

    expect(registry.size).toBe(0);
  });

  it('releases a lazily opened channel when the observer saw the task finished', () => {
    const { registry } = createRegistry();
    const subscription = registry.subscribe('t1');

    registry.unsubscribe('t1', subscription, true);

    expect(registry.has('t1')).toBe(false);
    expect(subscription.isClosed).toBe(true);
  });

  it('keeps a live channel when an observer leaves', () => {
    const { registry } = createRegistry();
    registry.open('t1');
    const subscription = registry.subscribe('t1');

    registry.unsubscribe('t1', subscription);

    expect(registry.has('t1')).toBe(true);
  });

  it('counts events dropped for full observers', () => {
    const { registry, metrics } = createRegistry(1);
    registry.open('t1');
    registry.subscribe('t1');

    expect(registry.publish('t1', progress)).toBe(1);
    expect(registry.publish('t1', progress)).toBe(0);

    expect(metrics.recordTaskEventsDropped).toHaveBeenCalledTimes(1);
    expect(metrics.recordTaskEventsDropped).toHaveBeenCalledWith('progress', 1);
  });

  it('closes observers when a channel is discarded', async () => {
    const { registry } = createRegistry();
    registry.open('t1');
    const subscription = registry.subscribe('t1');
    const pending = subscription.read(60_000);

    registry.discard('t1');

    await expect(pending).resolves.toEqual({ kind: 'closed' });
    expect(registry.has('t1')).toBe(false);
  });
});
