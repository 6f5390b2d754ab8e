import type { TranslationConfig } from './translation-config';

export const TRANSLATION_ENGINE = 'TranslationEngine';

/**
 * Runs one translation and yields the engine's raw events in production
 * order. Events are decoded by the caller.
 */
export interface TranslationEngine {
  run(config: TranslationConfig, inputPath: string): AsyncIterable<unknown>;
}
