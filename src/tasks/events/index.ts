export * from './task-event-channel';
export * from './task-events.registry';
