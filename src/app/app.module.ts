import { Module } from '@nestjs/common';
import { APP_FILTER, APP_INTERCEPTOR } from '@nestjs/core';
import { SentryGlobalFilter, SentryModule } from '@sentry/nestjs/setup';
import { TypeOrmModule } from '@nestjs/typeorm';

import { AppConfigModule, DbConfigModule, DbConfigService } from '@libs/config';
import { Task } from '@libs/entities';
import { SentryClientModule } from '@libs/sentry';

import { Tasks1747000000000 } from '../../db/migrations/1747000000000-tasks';
import { AuthModule } from '../auth';
import { MetricsModule, MetricsInterceptor } from '../metrics';
import { TasksModule } from '../tasks';
import { AppController } from './app.controller';

@Module({
  imports: [
    AppConfigModule,
    AuthModule,
    DbConfigModule,
    MetricsModule,
    SentryClientModule,
    SentryModule.forRoot(),
    TasksModule,
    TypeOrmModule.forRootAsync({
      imports: [DbConfigModule],
      useFactory: (config: DbConfigService) => ({
        type: 'postgres',
        host: config.host,
        port: config.port,
        username: config.username,
        password: config.password,
        database: config.database,
        logging: config.logging,
        entities: [Task],
        // Applied by TaskRecoveryService before startup recovery runs.
        migrations: [Tasks1747000000000],
        migrationsRun: false,
        ssl: config.ssl,
      }),
      inject: [DbConfigService],
    }),
  ],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: SentryGlobalFilter,
    },
    {
      provide: APP_INTERCEPTOR,
      useClass: MetricsInterceptor,
    },
  ],
})
export class AppModule {}
