export * from './app/config.module';
export * from './app/config.service';
export * from './db/config.module';
export * from './db/config.service';
export * from './engine/config.module';
export * from './engine/config.service';
export * from './tasks/config.module';
export * from './tasks/config.service';
