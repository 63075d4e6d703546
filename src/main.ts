import 'reflect-metadata';
import dotenv from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { loadConfig, resolveLogLevels } from './config/config';
import { createDataSource } from './config/data-source';
import { AppLogger } from './utils/logger.util';

dotenv.config();

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const dataSource = await createDataSource(config).initialize();

  const app = await NestFactory.create<NestExpressApplication>(
    AppModule.forRoot(config, dataSource),
    { logger: resolveLogLevels(config.logLevel) },
  );
  configureApp(app, config);
  app.enableShutdownHooks();

  await app.listen(config.port);
  AppLogger.log(`Listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  AppLogger.error('Failed to start application', error, 'Bootstrap');
  process.exit(1);
});
