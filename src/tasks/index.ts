export * from './admission.service';
export * from './errors';
export * from './events';
export * from './history-import.service';
export * from './interfaces';
export * from './task-recovery.service';
export * from './task-state-machine';
export * from './task-stream.service';
export * from './tasks.module';
export * from './tasks.processor';
export * from './tasks.service';
