import { Injectable } from '@nestjs/common';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { StorageService, isErrnoException } from '../storage';
import { TaskValidationError } from '../tasks/errors';

import type {
  SettingsProvider,
  UserSettings,
} from './settings-provider.interface';

const userSettingsSchema = z.record(z.unknown());

/**
 * Reads `users/<owner>/settings.json`. An owner who never saved settings
 * gets an empty object.
 */
@Injectable()
export class FileSettingsProvider implements SettingsProvider {
  constructor(private readonly storage: StorageService) {}

  public async get(owner: string): Promise<UserSettings> {
    let raw: string;
    try {
      raw = await readFile(this.storage.settingsPath(owner), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return {};
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new TaskValidationError(
        `Invalid translation settings: settings.json is not valid JSON (${
          error instanceof Error ? error.message : String(error)
        })`,
      );
    }

    const settings = userSettingsSchema.safeParse(parsed);
    if (!settings.success) {
      throw new TaskValidationError(
        'Invalid translation settings: settings.json must hold an object',
      );
    }
    return settings.data;
  }
}
