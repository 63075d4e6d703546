export * from './api-key.module';
export * from './app.module';
export * from './services/api-key.service';
export * from './services/item.service';
export * from './services/health.service';
export * from './guards/api-key.guard';
export * from './controllers/items.controller';
export * from './controllers/health.controller';
export * from './app.setup';
export * from './filters/http-exception.filter';
export * from './middleware/correlation-id.middleware';
export * from './middleware/request-logging.middleware';
export * from './middleware/request-size-limit.middleware';
export * from './middleware/security-headers.middleware';
export * from './config/config';
export * from './config/data-source';
export * from './decorators';
export * from './entities';
export * from './interfaces';
export * from './exceptions';
export * from './adapters';
export * from './utils';
