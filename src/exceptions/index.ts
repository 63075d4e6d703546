export * from './api-key.exceptions';
