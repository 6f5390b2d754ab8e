import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { TasksConfigModule } from '@libs/config';
import { Task } from '@libs/entities';
import { TasksRepository } from '@libs/repositories';
import { SentryClientModule } from '@libs/sentry';

import { EngineModule } from '../engine';
import { MetricsModule } from '../metrics';
import { SettingsModule } from '../settings';
import { StorageModule } from '../storage';
import { AdmissionService } from './admission.service';
import { TaskEventsRegistry } from './events';
import { HistoryImportService } from './history-import.service';
import { TaskRecoveryService } from './task-recovery.service';
import { TaskStreamService } from './task-stream.service';
import { TasksController } from './tasks.controller';
import { TasksProcessor } from './tasks.processor';
import { TasksService } from './tasks.service';

@Module({
  imports: [
    TypeOrmModule.forFeature([Task]),
    TasksConfigModule,
    SentryClientModule,
    MetricsModule,
    StorageModule,
    SettingsModule,
    EngineModule,
  ],
  controllers: [TasksController],
  providers: [
    TasksRepository,
    TaskEventsRegistry,
    AdmissionService,
    TasksService,
    TasksProcessor,
    TaskStreamService,
    TaskRecoveryService,
    HistoryImportService,
  ],
  exports: [TasksService, TasksProcessor],
})
export class TasksModule {}
