import { Injectable, Logger } from '@nestjs/common';
import { copyFile, mkdir, readdir, rename, rm, unlink } from 'node:fs/promises';
import { extname, join, resolve } from 'node:path';

import { TasksConfigService } from '@libs/config';
import type { OutputVariant } from '@libs/entities';

export interface StoredUpload {
  path: string;
  displayName: string;
}

const UNSAFE_FILENAME_CHARS = /[^\w\-\u4e00-\u9fff.]/g;

/**
 * Per-user file layout under the data directory:
 *
 *   users/<owner>/uploads/<fileId>_<originalName>
 *   users/<owner>/outputs/<taskId>/<displayName>_<variant>.pdf
 *   users/<owner>/settings.json
 *   users/<owner>/history.json
 */
@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);

  constructor(private readonly config: TasksConfigService) {}

  public userDir(owner: string): string {
    return resolve(this.config.dataDir, 'users', owner);
  }

  public uploadsDir(owner: string): string {
    return join(this.userDir(owner), 'uploads');
  }

  public outputDir(owner: string, taskId: string): string {
    return join(this.userDir(owner), 'outputs', taskId);
  }

  public settingsPath(owner: string): string {
    return join(this.userDir(owner), 'settings.json');
  }

  public legacyHistoryPath(owner: string): string {
    return join(this.userDir(owner), 'history.json');
  }

  /**
   * Finds the upload stored for `fileId`. The display name is the original
   * file name without its extension.
   */
  public async findUpload(
    owner: string,
    fileId: string,
  ): Promise<StoredUpload | null> {
    const prefix = `${fileId}_`;
    const entries = await this.listDir(this.uploadsDir(owner));
    const fileName = entries.find((entry) => entry.startsWith(prefix));
    if (!fileName) {
      return null;
    }

    const originalName = fileName.slice(prefix.length);
    return {
      path: join(this.uploadsDir(owner), fileName),
      displayName: originalName.slice(
        0,
        originalName.length - extname(originalName).length,
      ),
    };
  }

  public async ensureOutputDir(owner: string, taskId: string): Promise<string> {
    const dir = this.outputDir(owner, taskId);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  /**
   * Moves an engine artifact into the task's output directory under a name
   * derived from the display name.
   *
   * @returns the artifact's new path.
   */
  public async relocateArtifact(
    source: string,
    outputDir: string,
    displayName: string,
    variant: OutputVariant,
  ): Promise<string> {
    const target = join(
      outputDir,
      `${sanitizeFileName(displayName)}_${variant}.pdf`,
    );
    if (resolve(source) === resolve(target)) {
      return target;
    }

    try {
      await rename(source, target);
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EXDEV') {
        throw error;
      }
      // Engine scratch space on another device.
      await copyFile(source, target);
      await unlink(source);
    }
    return target;
  }

  /**
   * Removes a task's output directory and the upload it was created from.
   */
  public async removeTaskArtifacts(
    owner: string,
    taskId: string,
    fileId: string | null,
  ): Promise<void> {
    await rm(this.outputDir(owner, taskId), { recursive: true, force: true });

    if (!fileId) {
      return;
    }

    const uploadsDir = this.uploadsDir(owner);
    const uploads = (await this.listDir(uploadsDir)).filter((entry) =>
      entry.startsWith(`${fileId}_`),
    );
    for (const upload of uploads) {
      await rm(join(uploadsDir, upload), { force: true });
    }

    if (uploads.length > 0) {
      this.logger.log(
        `Removed ${uploads.length} upload(s) of file ${fileId} for task ${taskId}`,
      );
    }
  }

  private async listDir(dir: string): Promise<string[]> {
    try {
      return await readdir(dir);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
  }
}

export function sanitizeFileName(name: string): string {
  const cleaned = name.replace(UNSAFE_FILENAME_CHARS, '_');
  return cleaned.length > 0 ? cleaned : 'translated';
}

/**
 * Structural check: errors raised by Node in another realm (a VM context)
 * fail `instanceof Error`.
 */
export function isErrnoException(
  error: unknown,
): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
