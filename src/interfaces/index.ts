export * from './api-key.interface';
export * from './item.interface';
