import { Injectable, OnApplicationBootstrap } from '@nestjs/common';

import { TasksRepository } from '@libs/repositories';

/**
 * Brings the schema up to date and fails tasks a previous process left
 * unfinished, before the HTTP server takes requests.
 */
@Injectable()
export class TaskRecoveryService implements OnApplicationBootstrap {
  constructor(private readonly tasksRepo: TasksRepository) {}

  public async onApplicationBootstrap(): Promise<void> {
    await this.tasksRepo.initSchema();
    await this.tasksRepo.recoverStaleTasks();
  }
}
