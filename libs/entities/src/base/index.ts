export * from './model.entity';
