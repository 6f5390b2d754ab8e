import { Module } from '@nestjs/common';

import { StorageModule } from '../storage';

import { FileSettingsProvider } from './file-settings.provider';
import { SETTINGS_PROVIDER } from './settings-provider.interface';

@Module({
  imports: [StorageModule],
  providers: [
    FileSettingsProvider,
    {
      provide: SETTINGS_PROVIDER,
      useExisting: FileSettingsProvider,
    },
  ],
  exports: [SETTINGS_PROVIDER],
})
export class SettingsModule {}
