import type { TaskOutputs, TaskStatus } from '@libs/entities';

export interface TaskView {
  taskId: string;
  status: TaskStatus;
  progress: number;
  message: string;
  fileId: string | null;
  displayName: string;
  outputs: TaskOutputs | null;
  error: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}
