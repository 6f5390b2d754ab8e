export * from './create-task.dto';
