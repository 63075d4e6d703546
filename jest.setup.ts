import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { AppLogger } from './src/utils/logger.util';

// Keeps rejection and request logs out of the test output. Specs that assert
// on a log line spy on AppLogger directly.
class SilentLogger extends Logger {
  override log(): void {}
  override warn(): void {}
  override error(): void {}
  override debug(): void {}
  override verbose(): void {}
}

AppLogger.setLogger(new SilentLogger());
