import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
  Optional,
} from '@nestjs/common';

import { TaskOutputs, TaskStatus, TaskTokenUsage } from '@libs/entities';
import { SentryClientService } from '@libs/sentry';

import {
  EngineError,
  TaskValidationError,
} from './errors';
import type { TaskJob } from './interfaces';
import { TasksService } from './tasks.service';
import { AdmissionService } from './admission.service';
import {
  TRANSLATION_ENGINE,
  TranslationConfig,
  TranslationEngine,
  buildTranslationConfig,
  decodeEngineEvent,
  formatProgressMessage,
} from '../engine';
import type { MetricsService } from '../metrics';
import { SETTINGS_PROVIDER, SettingsProvider } from '../settings';
import { StorageService } from '../storage';

interface TranslationResult {
  outputs: TaskOutputs;
  tokenUsage: TaskTokenUsage | null;
}

export const NO_RESULT_DETAIL = 'Translation engine exited without a result';

/**
 * Drives each enqueued task from queued to a terminal state. A run never
 * rejects: whatever goes wrong ends in `TasksService.fail`.
 */
@Injectable()
export class TasksProcessor implements OnApplicationShutdown {
  private readonly logger = new Logger(TasksProcessor.name);
  private readonly running = new Map<string, Promise<void>>();

  constructor(
    private readonly tasksService: TasksService,
    private readonly admission: AdmissionService,
    private readonly storage: StorageService,
    @Inject(SETTINGS_PROVIDER)
    private readonly settingsProvider: SettingsProvider,
    @Inject(TRANSLATION_ENGINE)
    private readonly engine: TranslationEngine,
    private readonly sentry: SentryClientService,
    @Optional()
    @Inject('MetricsService')
    private readonly metrics?: Pick<MetricsService, 'recordTaskQueueWaitTime'>,
  ) {}

  /**
   * Starts the run in the background and returns immediately.
   */
  public enqueue(job: TaskJob): void {
    const run = this.run(job).finally(() => {
      this.running.delete(job.taskId);
    });
    this.running.set(job.taskId, run);
  }

  /**
   * Resolves once every run started by {@link enqueue} has finished,
   * including runs enqueued while waiting.
   */
  public async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()]);
    }
  }

  public onApplicationShutdown(signal?: string): void {
    if (this.running.size > 0) {
      this.logger.warn(
        `Shutting down${signal ? ` on ${signal}` : ''} with ${this.running.size} unfinished translation(s); they will be failed on next startup`,
      );
    }
  }

  public async run(job: TaskJob): Promise<void> {
    const enqueuedAt = Date.now();

    try {
      await this.tasksService.updateProgress(
        job.taskId,
        0,
        'Waiting in queue...',
        TaskStatus.Queued,
      );

      await this.admission.run(async () => {
        this.metrics?.recordTaskQueueWaitTime((Date.now() - enqueuedAt) / 1000);
        await this.translate(job);
      });
    } catch (error) {
      await this.recordFailure(job.taskId, error);
    }
  }

  private async translate(job: TaskJob): Promise<void> {
    const { taskId, owner } = job;

    await this.tasksService.updateProgress(
      taskId,
      0,
      'Loading user settings...',
    );
    const userSettings = await this.settingsProvider.get(owner);
    const outputDir = await this.storage.ensureOutputDir(owner, taskId);
    const config = buildTranslationConfig(
      userSettings,
      job.overrides,
      outputDir,
    );

    await this.tasksService.updateProgress(
      taskId,
      0,
      'Starting translation...',
    );
    this.logger.log(
      `Task ${taskId} started: ${config.service}, ${config.langFrom} -> ${config.langTo}`,
    );

    const result = await this.consumeEngine(job, config, outputDir);
    await this.tasksService.complete(taskId, result.outputs, result.tokenUsage);
  }

  private async consumeEngine(
    job: TaskJob,
    config: TranslationConfig,
    outputDir: string,
  ): Promise<TranslationResult> {
    for await (const raw of this.engine.run(config, job.inputPath)) {
      const event = decodeEngineEvent(raw);

      switch (event.type) {
        case 'finish':
          return {
            outputs: await this.relocateOutputs(
              job,
              outputDir,
              event.outputArtifacts,
            ),
            tokenUsage: event.tokenUsage,
          };
        case 'error':
          throw new EngineError(event.errorDetail);
        default:
          await this.tasksService.updateProgress(
            job.taskId,
            event.overallProgress,
            formatProgressMessage(event),
          );
      }
    }

    throw new EngineError(NO_RESULT_DETAIL);
  }

  private async relocateOutputs(
    job: TaskJob,
    outputDir: string,
    artifacts: TaskOutputs,
  ): Promise<TaskOutputs> {
    const outputs: TaskOutputs = {};
    if (artifacts.mono) {
      outputs.mono = await this.storage.relocateArtifact(
        artifacts.mono,
        outputDir,
        job.displayName,
        'mono',
      );
    }
    if (artifacts.dual) {
      outputs.dual = await this.storage.relocateArtifact(
        artifacts.dual,
        outputDir,
        job.displayName,
        'dual',
      );
    }
    return outputs;
  }

  private async recordFailure(taskId: string, error: unknown): Promise<void> {
    const detail = error instanceof Error ? error.message : String(error);

    // Engine and settings failures are the user's to see, not ours to page on.
    if (!(error instanceof EngineError || error instanceof TaskValidationError)) {
      this.logger.error(
        `Task ${taskId} crashed: ${detail}`,
        error instanceof Error ? error.stack : undefined,
      );
      this.sentry.sendTaskException(error, taskId);
    }

    try {
      await this.tasksService.fail(taskId, detail);
    } catch (failError) {
      this.logger.error(
        `Could not record failure of task ${taskId}: ${
          failError instanceof Error ? failError.message : String(failError)
        }`,
        failError instanceof Error ? failError.stack : undefined,
      );
      this.sentry.sendTaskException(failError, taskId, { detail });
    }
  }
}
