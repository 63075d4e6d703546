export * from './api-key-auth.decorator';
export * from './current-api-key.decorator';
