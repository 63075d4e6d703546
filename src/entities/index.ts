export * from './api-key.entity';
export * from './item.entity';
