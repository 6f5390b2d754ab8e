export * from './task.errors';
