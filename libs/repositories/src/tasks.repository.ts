import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import pLimit from 'p-limit';
import { DataSource, EntityManager, In, Repository, TypeORMError } from 'typeorm';

import { Task, TaskStatus } from '@libs/entities';

import { StoreError } from './store.error';

// Make MetricsService optional to avoid circular dependency issues
interface IMetricsService {
  recordDbQuery(operation: string, entity: string, duration: number): void;
  recordDbQueryError(
    operation: string,
    entity: string,
    errorType: string,
  ): void;
}

export const RESTART_ERROR_DETAIL = 'Server restarted during translation';

export type LegacyTaskRecord = Partial<Task> &
  Pick<Task, 'taskId' | 'owner' | 'status' | 'createdAt'>;

const STALE_STATUSES = [TaskStatus.Queued, TaskStatus.Processing];

@Injectable()
export class TasksRepository {
  private readonly logger = new Logger(TasksRepository.name);

  // Every write goes through this gate, so no two transactions interleave
  // on this process whatever the driver's own locking does.
  private readonly writeGate = pLimit(1);

  constructor(
    @InjectRepository(Task)
    private readonly repository: Repository<Task>,
    private readonly dataSource: DataSource,
    @Optional()
    @Inject('MetricsService')
    private readonly metrics?: IMetricsService,
  ) {}

  /**
   * Brings the schema up to date by running the migrations registered on
   * the data source. Already-applied migrations are skipped.
   */
  public async initSchema(): Promise<void> {
    const applied = await this.track('initSchema', 'migration_error', () =>
      this.writeGate(() =>
        this.dataSource.runMigrations({ transaction: 'each' }),
      ),
    );

    if (applied.length > 0) {
      this.logger.log(
        `Applied migrations: ${applied.map((m) => m.name).join(', ')}`,
      );
    }
  }

  /**
   * Runs `work` inside one transaction: committed when it resolves, rolled
   * back when it throws. Errors raised by `work` itself reach the caller
   * unchanged; driver failures are wrapped in {@link StoreError}.
   */
  public async withTransaction<T>(
    work: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const startTime = Date.now();
    try {
      const result = await this.writeGate(() =>
        this.dataSource.transaction(work),
      );
      this.metrics?.recordDbQuery(
        'transaction',
        'Task',
        (Date.now() - startTime) / 1000,
      );
      return result;
    } catch (error) {
      if (error instanceof TypeORMError) {
        this.metrics?.recordDbQueryError(
          'transaction',
          'Task',
          'transaction_error',
        );
        this.logger.error(`Task transaction failed: ${error.message}`);
        throw new StoreError('transaction', error);
      }
      throw error;
    }
  }

  public async create(task: Partial<Task>): Promise<Task> {
    return this.track('create', 'save_error', () =>
      this.writeGate(() => {
        const entity = this.repository.create(task);
        return this.repository.save(entity);
      }),
    );
  }

  public async findOneByTaskId(taskId: string): Promise<Task | null> {
    return this.track('findOne', 'query_error', () =>
      this.repository.findOne({ where: { taskId } }),
    );
  }

  /**
   * Lists an owner's tasks, newest first.
   */
  public async findByOwner(owner: string): Promise<Task[]> {
    return this.track('findByOwner', 'query_error', () =>
      this.repository.find({
        where: { owner },
        order: { createdAt: 'DESC', id: 'DESC' },
      }),
    );
  }

  /**
   * Deletes a task row. Resolves to false when no row matched.
   */
  public async remove(taskId: string): Promise<boolean> {
    return this.withTransaction(async (manager) => {
      const existing = await manager.findOne(Task, { where: { taskId } });
      if (!existing) {
        return false;
      }
      await manager.delete(Task, { taskId });
      return true;
    });
  }

  /**
   * Fails every task left queued or processing by a previous process. Run
   * once at startup, before any task is admitted. Terminal tasks are never
   * touched, so a second call is a no-op.
   *
   * @returns the number of tasks that were failed.
   */
  public async recoverStaleTasks(now: Date = new Date()): Promise<number> {
    const recovered = await this.withTransaction(async (manager) => {
      const stale = await manager.find(Task, {
        where: { status: In(STALE_STATUSES) },
        select: { id: true, taskId: true },
      });
      if (stale.length === 0) {
        return 0;
      }

      await manager.update(
        Task,
        { taskId: In(stale.map((task) => task.taskId)) },
        {
          status: TaskStatus.Failed,
          message: `Translation failed: ${RESTART_ERROR_DETAIL}`,
          error: RESTART_ERROR_DETAIL,
          outputs: null,
          completedAt: now,
        },
      );
      return stale.length;
    });

    if (recovered > 0) {
      this.logger.log(`Recovered ${recovered} stale tasks on startup`);
    }
    return recovered;
  }

  /**
   * Inserts legacy history records, skipping ids that already exist.
   *
   * @returns the number of records inserted.
   */
  public async importLegacy(records: LegacyTaskRecord[]): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    return this.withTransaction(async (manager) => {
      const existing = await manager.find(Task, {
        where: { taskId: In(records.map((record) => record.taskId)) },
        select: { id: true, taskId: true },
      });
      const known = new Set(existing.map((task) => task.taskId));

      let inserted = 0;
      for (const record of records) {
        if (known.has(record.taskId)) {
          continue;
        }
        await manager.save(manager.create(Task, record));
        known.add(record.taskId);
        inserted += 1;
      }
      return inserted;
    });
  }

  private async track<T>(
    operation: string,
    errorType: string,
    run: () => Promise<T>,
  ): Promise<T> {
    const startTime = Date.now();
    try {
      const result = await run();
      const duration = (Date.now() - startTime) / 1000;
      this.metrics?.recordDbQuery(operation, 'Task', duration);
      return result;
    } catch (error) {
      this.metrics?.recordDbQueryError(operation, 'Task', errorType);
      if (error instanceof StoreError) {
        throw error;
      }
      throw new StoreError(operation, error);
    }
  }
}
