import { Module } from '@nestjs/common';

import { MetricsController } from './metrics.controller';
import { MetricsInterceptor } from './metrics.interceptor';
import { MetricsService } from './metrics.service';

@Module({
  controllers: [MetricsController],
  providers: [
    MetricsService,
    MetricsInterceptor,
    {
      provide: 'MetricsService',
      useExisting: MetricsService,
    },
  ],
  exports: [MetricsService, MetricsInterceptor, 'MetricsService'],
})
export class MetricsModule {}
