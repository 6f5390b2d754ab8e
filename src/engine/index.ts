export * from './command-translation.engine';
export * from './engine-events';
export * from './engine.module';
export * from './translation-config';
export * from './translation-engine.interface';
