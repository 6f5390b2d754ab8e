import { Injectable, Logger } from '@nestjs/common';
import { readFile, rename } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';

import { TaskOutputs, TaskStatus } from '@libs/entities';
import {
  LegacyTaskRecord,
  RESTART_ERROR_DETAIL,
  TasksRepository,
} from '@libs/repositories';

import { StorageService, isErrnoException } from '../storage';
import {
  COMPLETED_MESSAGE,
  failureMessage,
} from './tasks.service';

const optionalText = z.string().nullish();

const legacyHistoryItemSchema = z.object({
  task_id: optionalText,
  file_id: optionalText,
  original_filename: optionalText,
  filename: optionalText,
  status: optionalText,
  mono_path: optionalText,
  dual_path: optionalText,
  error: optionalText,
  created_at: optionalText,
  completed_at: optionalText,
});

type LegacyHistoryItem = z.infer<typeof legacyHistoryItemSchema>;

function parseDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function stripExtension(fileName: string): string {
  return fileName.slice(0, fileName.length - extname(fileName).length);
}

/**
 * Moves per-user `history.json` files from before the task table existed
 * into the store. Nothing imported is left queued or processing.
 */
@Injectable()
export class HistoryImportService {
  private readonly logger = new Logger(HistoryImportService.name);

  constructor(
    private readonly storage: StorageService,
    private readonly tasksRepo: TasksRepository,
  ) {}

  /**
   * @returns the number of tasks imported. A missing, unreadable or
   * malformed file imports nothing.
   */
  public async importForOwner(owner: string): Promise<number> {
    const historyPath = this.storage.legacyHistoryPath(owner);

    let raw: string;
    try {
      raw = await readFile(historyPath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return 0;
      }
      this.logger.warn(
        `Could not read legacy history for ${owner}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      return 0;
    }

    const items = this.parseHistory(owner, raw);
    if (items.length === 0) {
      return 0;
    }

    const now = new Date();
    const records = items
      .map((item) => this.toRecord(owner, item, now))
      .filter((record): record is LegacyTaskRecord => record !== null);

    const imported = await this.tasksRepo.importLegacy(records);
    if (imported > 0) {
      this.logger.log(`Migrated ${imported} history items for user ${owner}`);
    }
    if (records.length > 0) {
      await this.archive(owner, historyPath);
    }
    return imported;
  }

  /**
   * Every record is in the store by now, so a failed rename only means the
   * file is read again on the next listing.
   */
  private async archive(owner: string, historyPath: string): Promise<void> {
    try {
      await rename(historyPath, `${historyPath}.bak`);
    } catch (error) {
      this.logger.warn(
        `Could not archive legacy history for ${owner}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
    }
  }

  private parseHistory(owner: string, raw: string): LegacyHistoryItem[] {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`Ignoring malformed legacy history for ${owner}`);
      return [];
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`Ignoring legacy history for ${owner}: not a list`);
      return [];
    }

    const items: LegacyHistoryItem[] = [];
    let skipped = 0;
    for (const entry of parsed) {
      const item = legacyHistoryItemSchema.safeParse(entry);
      if (item.success) {
        items.push(item.data);
      } else {
        skipped += 1;
      }
    }
    if (skipped > 0) {
      this.logger.warn(
        `Skipped ${skipped} unreadable legacy history item(s) for ${owner}`,
      );
    }
    return items;
  }

  private toRecord(
    owner: string,
    item: LegacyHistoryItem,
    now: Date,
  ): LegacyTaskRecord | null {
    if (!item.task_id) {
      return null;
    }

    const createdAt = parseDate(item.created_at) ?? now;
    const completedAt = parseDate(item.completed_at) ?? createdAt;
    const fileName = item.original_filename ?? item.filename ?? '';
    const base = {
      taskId: item.task_id,
      owner,
      fileId: item.file_id ?? null,
      displayName: stripExtension(fileName),
      settingsSnapshot: null,
      tokenUsage: null,
      createdAt,
      startedAt: null,
      completedAt,
    };

    if ((item.status ?? 'completed') === 'completed') {
      const outputs: TaskOutputs = {};
      if (item.mono_path) {
        outputs.mono = item.mono_path;
      }
      if (item.dual_path) {
        outputs.dual = item.dual_path;
      }
      return {
        ...base,
        status: TaskStatus.Completed,
        progress: 100,
        message: COMPLETED_MESSAGE,
        outputs,
        error: null,
      };
    }

    const error = item.error || RESTART_ERROR_DETAIL;
    return {
      ...base,
      status: TaskStatus.Failed,
      progress: 0,
      message: failureMessage(error),
      outputs: null,
      error,
    };
  }
}
