export * from './base';
export * from './task.entity';
