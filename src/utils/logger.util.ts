import { Logger } from '@nestjs/common';

const DEFAULT_CONTEXT = 'ApiKeyService';

/**
 * Static logging facade over the Nest logger, shared by services, adapters and
 * the CLI. Replace the underlying instance with `setLogger` (tests install a
 * silent one).
 */
export class AppLogger {
  private static logger: Logger | null = null;

  static setLogger(logger: Logger): void {
    AppLogger.logger = logger;
  }

  private static getLogger(): Logger {
    if (!AppLogger.logger) {
      AppLogger.logger = new Logger(DEFAULT_CONTEXT);
    }
    return AppLogger.logger;
  }

  static log(message: string, context?: string): void {
    AppLogger.getLogger().log(message, context || DEFAULT_CONTEXT);
  }

  static warn(message: string, context?: string): void {
    AppLogger.getLogger().warn(message, context || DEFAULT_CONTEXT);
  }

  /**
   * Logs an error message. When an `Error` is given its stack is logged.
   */
  static error(message: string, error?: unknown, context?: string): void {
    AppLogger.getLogger().error(
      message,
      error instanceof Error ? error.stack : error === undefined ? undefined : String(error),
      context || DEFAULT_CONTEXT,
    );
  }

  static debug(message: string, context?: string): void {
    AppLogger.getLogger().debug(message, context || DEFAULT_CONTEXT);
  }
}
