export * from './file-settings.provider';
export * from './settings-provider.interface';
export * from './settings.module';
