import { DataSource } from 'typeorm';

import { TasksConfigService } from '@libs/config';
import { TaskStatus } from '@libs/entities';
import { TasksRepository } from '@libs/repositories';

import { StorageService } from '../storage';
import {
  createTestConfigService,
  createTestDataSource,
  createTestRepository,
} from '../testing/test-data-source';
import { TaskNotFoundError } from './errors';
import { TaskEventsRegistry } from './events';
import type { TaskStreamMessage } from './interfaces';
import { TaskStreamService } from './task-stream.service';
import { TasksService } from './tasks.service';

type Stream = AsyncGenerator<TaskStreamMessage, void, undefined>;

async function collect(stream: Stream): Promise<TaskStreamMessage[]> {
  const messages: TaskStreamMessage[] = [];
  for await (const message of stream) {
    messages.push(message);
  }
  return messages;
}

describe('TaskStreamService', () => {
  let dataSource: DataSource;
  let repository: TasksRepository;
  let registry: TaskEventsRegistry;
  let tasksService: TasksService;
  let streams: TaskStreamService;

  function setup(keepaliveMs = 30000, channelCapacity = 100) {
    const config = new TasksConfigService(
      createTestConfigService({
        tasks: {
          streamKeepaliveMs: String(keepaliveMs),
          channelCapacity: String(channelCapacity),
        },
      }),
    );
    registry = new TaskEventsRegistry(config);
    tasksService = new TasksService(
      repository,
      registry,
      new StorageService(config),
    );
    streams = new TaskStreamService(tasksService, registry, config);
  }

  const create = () =>
    tasksService.create({
      owner: 'alice',
      fileId: 'file-1',
      displayName: 'paper',
      settingsSnapshot: {},
    });

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    repository = await createTestRepository(dataSource);
    setup();
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('refuses tasks that do not exist or belong to someone else', async () => {
    const taskId = await create();

    await expect(streams.attach('missing', 'alice')).rejects.toBeInstanceOf(
      TaskNotFoundError,
    );
    await expect(streams.attach(taskId, 'bob')).rejects.toBeInstanceOf(
      TaskNotFoundError,
    );
  });

  it('sends a finished task\'s terminal event once and ends', async () => {
    const taskId = await create();
    await tasksService.updateProgress(taskId, 40, 'Translate (1/1, 2/5)');
    await tasksService.complete(taskId, { mono: '/out/paper_mono.pdf' });

    const messages = await collect(await streams.attach(taskId, 'alice'));

    expect(messages).toEqual([
      {
        type: 'complete',
        status: TaskStatus.Completed,
        progress: 100,
        message: 'Translation completed',
        outputs: { mono: '/out/paper_mono.pdf' },
      },
    ]);
    expect(registry.has(taskId)).toBe(false);
  });

  it('sends a snapshot, relays updates and ends after the terminal event', async () => {
    const taskId = await create();
    const stream = await streams.attach(taskId, 'alice');

    await expect(stream.next()).resolves.toEqual({
      done: false,
      value: {
        type: 'progress',
        status: TaskStatus.Queued,
        progress: 0,
        message: 'Translation queued',
      },
    });

    await tasksService.updateProgress(taskId, 25, 'Layout (1/2, 2/5)');
    await tasksService.fail(taskId, 'OCR timeout');

    await expect(collect(stream)).resolves.toEqual([
      {
        type: 'progress',
        status: TaskStatus.Processing,
        progress: 25,
        message: 'Layout (1/2, 2/5)',
      },
      {
        type: 'error',
        status: TaskStatus.Failed,
        progress: 25,
        message: 'Translation failed: OCR timeout',
        error: 'OCR timeout',
      },
    ]);
    expect(registry.has(taskId)).toBe(false);
  });

  it('does not repeat a terminal event committed while attaching', async () => {
    const taskId = await create();
    await tasksService.updateProgress(taskId, 90, 'Typesetting (1/1, 3/4)');

    const get = tasksService.get.bind(tasksService);
    jest.spyOn(tasksService, 'get').mockImplementationOnce(async (id) => {
      // Lands after the observer subscribed, before the re-read.
      await tasksService.complete(id, {});
      return get(id);
    });

    const messages = await collect(await streams.attach(taskId, 'alice'));

    expect(messages.map((message) => message.type)).toEqual(['complete']);
    expect(registry.has(taskId)).toBe(false);
  });

  it('gives a late observer the latest progress, then live events', async () => {
    const taskId = await create();
    await tasksService.updateProgress(taskId, 10, 'Parse (1/1, 1/3)');
    await tasksService.updateProgress(taskId, 20, 'Parse (1/1, 2/3)');
    await tasksService.updateProgress(taskId, 30, 'Parse (1/1, 3/3)');

    const stream = await streams.attach(taskId, 'alice');
    await expect(stream.next()).resolves.toEqual({
      done: false,
      value: {
        type: 'progress',
        status: TaskStatus.Processing,
        progress: 30,
        message: 'Parse (1/1, 3/3)',
      },
    });

    await tasksService.complete(taskId, { mono: '/data/paper_mono.pdf' });

    await expect(collect(stream)).resolves.toEqual([
      {
        type: 'complete',
        status: TaskStatus.Completed,
        progress: 100,
        message: 'Translation completed',
        outputs: { mono: '/data/paper_mono.pdf' },
      },
    ]);
  });

  it('ends with the stored outcome when the terminal event did not fit', async () => {
    setup(10, 1);
    const taskId = await create();
    const stream = await streams.attach(taskId, 'alice');
    await stream.next();

    await tasksService.updateProgress(taskId, 50, 'Translate (1/1, 1/2)');
    await tasksService.complete(taskId, { dual: '/data/paper_dual.pdf' });

    await expect(collect(stream)).resolves.toEqual([
      {
        type: 'progress',
        status: TaskStatus.Processing,
        progress: 50,
        message: 'Translate (1/1, 1/2)',
      },
      {
        type: 'complete',
        status: TaskStatus.Completed,
        progress: 100,
        message: 'Translation completed',
        outputs: { dual: '/data/paper_dual.pdf' },
      },
    ]);
    expect(registry.has(taskId)).toBe(false);
  });

  it('sends keepalives while the task is quiet', async () => {
    setup(5);
    const taskId = await create();
    const stream = await streams.attach(taskId, 'alice');

    await stream.next();
    await expect(stream.next()).resolves.toEqual({
      done: false,
      value: { type: 'ping' },
    });

    await stream.return();
  });

  it('stops without error when the observer disconnects', async () => {
    const taskId = await create();
    const disconnected = new AbortController();
    const stream = await streams.attach(taskId, 'alice', disconnected.signal);

    await stream.next();
    const pending = stream.next();
    disconnected.abort();

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(registry.has(taskId)).toBe(true);
    expect(registry.publish(taskId, {
      type: 'progress',
      status: TaskStatus.Processing,
      progress: 1,
      message: 'x',
    })).toBe(0);
  });

  it('lets several observers follow one task', async () => {
    const taskId = await create();
    const first = await streams.attach(taskId, 'alice');
    const second = await streams.attach(taskId, 'alice');
    await first.next();
    await second.next();

    await tasksService.updateProgress(taskId, 50, 'Translate (1/1, 1/2)');
    await tasksService.complete(taskId, {});

    const [a, b] = await Promise.all([collect(first), collect(second)]);
    expect(a.map((message) => message.type)).toEqual(['progress', 'complete']);
    expect(b).toEqual(a);
  });
});
