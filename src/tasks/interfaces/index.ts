export * from './task-event.interface';
export * from './task-job.interface';
export * from './task-view.interface';
