import { Injectable } from '@nestjs/common';
import * as Sentry from '@sentry/nestjs';

import { AppConfigService } from '@libs/config';

@Injectable()
export class SentryClientService {
  constructor(private readonly config: AppConfigService) {}

  /**
   * Reports a failure that happened while running a task (in production
   * only). The task id is attached as a tag so every report for one run
   * can be grouped.
   */
  public sendTaskException(
    error: unknown,
    taskId: string,
    extra?: Record<string, unknown>,
  ) {
    if (this.config.isProd) {
      Sentry.captureException(error, { tags: { taskId }, extra });
    }
  }
}
