import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import request from 'supertest';

import { Task, TaskStatus } from '@libs/entities';
import { TransformInterceptor } from '@libs/interceptors';

import { Tasks1747000000000 } from '../../db/migrations/1747000000000-tasks';
import { AuthModule, AuthService } from '../auth';
import { TRANSLATION_ENGINE } from '../engine';
import { StorageService } from '../storage';
import { FakeTranslationEngine, deferred, waitFor } from '../testing/fakes';
import { createTempDir, removeTempDir } from '../testing/test-data-source';
import { TaskEventsRegistry } from './events';
import { TasksModule } from './tasks.module';
import { TasksProcessor } from './tasks.processor';
import { TasksService } from './tasks.service';

describe('TasksController', () => {
  let dataDir: string;
  let app: INestApplication;
  let processor: TasksProcessor;
  let storage: StorageService;
  let aliceToken: string;
  let bobToken: string;

  const engine = new FakeTranslationEngine(async function* (config) {
    yield {
      type: 'progress_update',
      stage: 'Translate',
      overall_progress: 50,
      part_index: 1,
      total_parts: 1,
      stage_current: 1,
      stage_total: 2,
    };
    const artifact = join(config.output, 'engine-output.pdf');
    await writeFile(artifact, 'translated');
    yield { type: 'finish', output_artifacts: { mono: artifact } };
  });

  async function upload(owner: string, fileName: string): Promise<void> {
    const dir = storage.uploadsDir(owner);
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, fileName), 'pdf');
  }

  async function createTask(fileId: string): Promise<string> {
    const response = await request(app.getHttpServer())
      .post('/tasks')
      .set('Authorization', `Bearer ${aliceToken}`)
      .send({ fileId, settings: { lang_to: 'ja' } })
      .expect(201);
    return response.body.data.taskId;
  }

  beforeAll(async () => {
    dataDir = await createTempDir();
    process.env.TASKS_DATA_DIR = dataDir;
    process.env.APP_SECRET_KEY = 'test-secret';

    const moduleRef = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [Task],
          migrations: [Tasks1747000000000],
          migrationsRun: false,
        }),
        AuthModule,
        TasksModule,
      ],
    })
      .overrideProvider(TRANSLATION_ENGINE)
      .useValue(engine)
      .compile();

    app = moduleRef.createNestApplication();
    app.useGlobalInterceptors(new TransformInterceptor());
    app.useGlobalPipes(
      new ValidationPipe({
        transform: true,
        whitelist: true,
        forbidUnknownValues: true,
        stopAtFirstError: true,
      }),
    );
    await app.init();

    processor = app.get(TasksProcessor);
    storage = app.get(StorageService);
    const auth = app.get(AuthService);
    aliceToken = auth.signToken('alice');
    bobToken = auth.signToken('bob');
  });

  afterAll(async () => {
    await app.close();
    await removeTempDir(dataDir);
    delete process.env.TASKS_DATA_DIR;
    delete process.env.APP_SECRET_KEY;
  });

  it('requires a token', async () => {
    const response = await request(app.getHttpServer())
      .get('/tasks')
      .expect(401);

    expect(response.body.message).toBe('Missing token');
  });

  it('validates the request body', async () => {
    await request(app.getHttpServer())
      .post('/tasks')
      .set('Authorization', `Bearer ${aliceToken}`)
      .send({ settings: {} })
      .expect(400);
  });

  it('rejects an unknown upload', async () => {
    const response = await request(app.getHttpServer())
      .post('/tasks')
      .set('Authorization', `Bearer ${aliceToken}`)
      .send({ fileId: 'missing' })
      .expect(404);

    expect(response.body.message).toBe('File missing not found');
  });

  it('translates an upload and serves the finished task', async () => {
    await upload('alice', 'f1_paper.pdf');

    const taskId = await createTask('f1');
    await processor.whenIdle();

    const outputDir = storage.outputDir('alice', taskId);
    const response = await request(app.getHttpServer())
      .get(`/tasks/${taskId}`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .expect(200);

    expect(response.body.data).toMatchObject({
      taskId,
      status: TaskStatus.Completed,
      progress: 100,
      message: 'Translation completed',
      fileId: 'f1',
      displayName: 'paper',
      outputs: { mono: join(outputDir, 'paper_mono.pdf') },
      error: null,
    });
    expect(engine.runs.at(-1)?.config.langTo).toBe('ja');
    await expect(
      access(join(outputDir, 'paper_mono.pdf')),
    ).resolves.toBeUndefined();

    const list = await request(app.getHttpServer())
      .get('/tasks')
      .set('Authorization', `Bearer ${aliceToken}`)
      .expect(200);
    expect(list.body.data.map((task: { taskId: string }) => task.taskId)).toContain(
      taskId,
    );
  });

  it('streams the final event of a finished task and ends', async () => {
    await upload('alice', 'f2_notes.pdf');
    const taskId = await createTask('f2');
    await processor.whenIdle();

    const response = await request(app.getHttpServer())
      .get(`/tasks/${taskId}/stream`)
      .query({ token: aliceToken })
      .set('Accept', 'text/event-stream')
      .expect(200)
      .expect('Content-Type', /^text\/event-stream/);

    const [frame] = response.text.split('\n\n');
    const [eventLine, dataLine] = frame.split('\n');
    expect(eventLine).toBe('event: complete');
    expect(JSON.parse(dataLine.slice('data: '.length))).toEqual({
      type: 'complete',
      status: TaskStatus.Completed,
      progress: 100,
      message: 'Translation completed',
      outputs: {
        mono: join(storage.outputDir('alice', taskId), 'notes_mono.pdf'),
      },
    });
  });

  it('streams a running task live until it completes', async () => {
    await upload('alice', 'f5_live.pdf');
    const release = deferred();
    engine.script(
      join(storage.uploadsDir('alice'), 'f5_live.pdf'),
      async function* (config) {
        yield {
          type: 'progress_update',
          stage: 'Translate',
          overall_progress: 40,
          part_index: 1,
          total_parts: 1,
          stage_current: 1,
          stage_total: 2,
        };
        await release.promise;
        const artifact = join(config.output, 'engine-output.pdf');
        await writeFile(artifact, 'translated');
        yield { type: 'finish', output_artifacts: { mono: artifact } };
      },
    );

    const taskId = await createTask('f5');
    const tasksService = app.get(TasksService);
    await waitFor(async () => (await tasksService.get(taskId))?.progress === 40);

    const streaming = request(app.getHttpServer())
      .get(`/tasks/${taskId}/stream`)
      .query({ token: aliceToken })
      .set('Accept', 'text/event-stream')
      .then((response) => response);

    const registry = app.get(TaskEventsRegistry);
    await waitFor(() => registry.open(taskId).subscriberCount === 1);
    release.resolve();

    const response = await streaming;
    await processor.whenIdle();

    expect(response.status).toBe(200);
    const frames = response.text
      .split('\n\n')
      .filter((frame) => frame.length > 0)
      .map((frame) => {
        const [eventLine, dataLine] = frame.split('\n');
        return {
          event: eventLine.slice('event: '.length),
          data: JSON.parse(dataLine.slice('data: '.length)),
        };
      });
    expect(frames).toEqual([
      {
        event: 'progress',
        data: {
          type: 'progress',
          status: TaskStatus.Processing,
          progress: 40,
          message: 'Translate (1/1, 1/2)',
        },
      },
      {
        event: 'complete',
        data: {
          type: 'complete',
          status: TaskStatus.Completed,
          progress: 100,
          message: 'Translation completed',
          outputs: {
            mono: join(storage.outputDir('alice', taskId), 'live_mono.pdf'),
          },
        },
      },
    ]);
    expect(registry.has(taskId)).toBe(false);
  });

  it("hides other owners' tasks", async () => {
    await upload('alice', 'f3_private.pdf');
    const taskId = await createTask('f3');
    await processor.whenIdle();

    await request(app.getHttpServer())
      .get(`/tasks/${taskId}`)
      .set('Authorization', `Bearer ${bobToken}`)
      .expect(404);
    await request(app.getHttpServer())
      .get(`/tasks/${taskId}/stream`)
      .query({ token: bobToken })
      .expect(404);
    await request(app.getHttpServer())
      .delete(`/tasks/${taskId}`)
      .set('Authorization', `Bearer ${bobToken}`)
      .expect(404);
  });

  it('deletes a finished task with its files', async () => {
    await upload('alice', 'f4_old.pdf');
    const taskId = await createTask('f4');
    await processor.whenIdle();

    const response = await request(app.getHttpServer())
      .delete(`/tasks/${taskId}`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .expect(200);

    expect(response.body.data).toEqual({ deleted: true });
    await expect(storage.findUpload('alice', 'f4')).resolves.toBeNull();
    await request(app.getHttpServer())
      .get(`/tasks/${taskId}`)
      .set('Authorization', `Bearer ${aliceToken}`)
      .expect(404);
  });
});
