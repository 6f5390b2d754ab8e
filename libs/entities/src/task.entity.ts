import { Column, Entity } from 'typeorm';

import { Model } from './base';

export enum TaskStatus {
  Queued = 'queued',
  Processing = 'processing',
  Completed = 'completed',
  Failed = 'failed',
}

export type OutputVariant = 'mono' | 'dual';

/**
 * Named output artifacts of a completed run, keyed by variant.
 */
export type TaskOutputs = Partial<Record<OutputVariant, string>>;

export type TaskSettingsSnapshot = Record<string, unknown>;

export type TaskTokenUsage = Record<string, number>;

@Entity('tasks')
export class Task extends Model {
  @Column({ name: 'task_id', type: 'text', unique: true })
  taskId!: string;

  @Column({ type: 'text' })
  owner!: string;

  @Column({ type: 'text' })
  status!: TaskStatus;

  @Column({ type: 'int', default: 0 })
  progress!: number;

  @Column({ type: 'text', default: '' })
  message!: string;

  @Column({ name: 'file_id', type: 'text', nullable: true })
  fileId!: string | null;

  @Column({ name: 'display_name', type: 'text', default: '' })
  displayName!: string;

  // Per-run overrides captured at creation; never written again.
  @Column({ name: 'settings_snapshot', type: 'simple-json', nullable: true })
  settingsSnapshot!: TaskSettingsSnapshot | null;

  @Column({ type: 'simple-json', nullable: true })
  outputs!: TaskOutputs | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  @Column({ name: 'token_usage', type: 'simple-json', nullable: true })
  tokenUsage!: TaskTokenUsage | null;

  @Column({ name: 'created_at', type: Date })
  createdAt!: Date;

  @Column({ name: 'started_at', type: Date, nullable: true })
  startedAt!: Date | null;

  @Column({ name: 'completed_at', type: Date, nullable: true })
  completedAt!: Date | null;
}
