import type { TaskSettingsSnapshot } from '@libs/entities';

/**
 * Everything the processor needs to drive one task from queued to terminal.
 */
export interface TaskJob {
  taskId: string;
  owner: string;
  inputPath: string;
  displayName: string;
  overrides: TaskSettingsSnapshot;
}
