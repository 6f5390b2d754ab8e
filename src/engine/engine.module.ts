import { Module } from '@nestjs/common';

import { EngineConfigModule } from '@libs/config';

import { CommandTranslationEngine } from './command-translation.engine';
import { TRANSLATION_ENGINE } from './translation-engine.interface';

@Module({
  imports: [EngineConfigModule],
  providers: [
    CommandTranslationEngine,
    {
      provide: TRANSLATION_ENGINE,
      useExisting: CommandTranslationEngine,
    },
  ],
  exports: [TRANSLATION_ENGINE],
})
export class EngineModule {}
