import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';

import configuration from './configuration';
import { EngineConfigService } from './config.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      cache: true,
      load: [configuration],
    }),
  ],
  providers: [ConfigService, EngineConfigService],
  exports: [ConfigService, EngineConfigService],
})
export class EngineConfigModule {}
