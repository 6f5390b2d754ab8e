import { Module } from '@nestjs/common';

import { TasksConfigModule } from '@libs/config';

import { StorageService } from './storage.service';

@Module({
  imports: [TasksConfigModule],
  providers: [StorageService],
  exports: [StorageService],
})
export class StorageModule {}
