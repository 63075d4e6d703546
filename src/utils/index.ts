export * from './logger.util';
export * from './secret.util';
export * from './store-error.util';
export * from './validation.util';
