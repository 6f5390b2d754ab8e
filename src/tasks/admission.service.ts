import { Inject, Injectable, Optional } from '@nestjs/common';
import pLimit from 'p-limit';

import { TasksConfigService } from '@libs/config';

import type { MetricsService } from '../metrics';

/**
 * Bounds how many translation runs are inside the engine at once. Waiters
 * are admitted first in, first out.
 */
@Injectable()
export class AdmissionService {
  private readonly limit: ReturnType<typeof pLimit>;
  public readonly capacity: number;

  constructor(
    config: TasksConfigService,
    @Optional()
    @Inject('MetricsService')
    private readonly metrics?: Pick<MetricsService, 'setTaskQueueSize'>,
  ) {
    this.capacity = config.maxConcurrent;
    this.limit = pLimit(this.capacity);
  }

  public get activeCount(): number {
    return this.limit.activeCount;
  }

  public get pendingCount(): number {
    return this.limit.pendingCount;
  }

  /**
   * Waits for a free slot, runs `work` and releases the slot once `work`
   * settles, whether it resolved or threw.
   */
  public run<T>(work: () => Promise<T>): Promise<T> {
    const admitted = this.limit(async () => {
      this.report(0);
      try {
        return await work();
      } finally {
        // Still counted as active until this function returns.
        this.report(-1);
      }
    });
    this.report(0);
    return admitted;
  }

  private report(activeOffset: number): void {
    this.metrics?.setTaskQueueSize(
      this.limit.pendingCount,
      this.limit.activeCount + activeOffset,
    );
  }
}
