export * from './store.error';
export * from './tasks.repository';
