import { Injectable } from '@nestjs/common';
import { IApiKeyAdapter } from '../adapters/base.adapter';
import { AppLogger } from '../utils/logger.util';

export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;

export type CheckResult = 'ok' | 'timeout' | 'error';

export interface ReadinessStatus {
  status: 'ok' | 'degraded';
  checks: {
    database: CheckResult;
  };
}

const TIMED_OUT = Symbol('timed-out');

/**
 * Service for checking whether the key store can be reached.
 */
@Injectable()
export class HealthService {
  constructor(
    private readonly adapter: IApiKeyAdapter,
    private readonly timeoutMs: number = DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  ) {}

  /**
   * Runs a count against the key store, bounded by the configured timeout.
   */
  async checkReadiness(): Promise<ReadinessStatus> {
    const database = await this.checkDatabase();
    return {
      status: database === 'ok' ? 'ok' : 'degraded',
      checks: { database },
    };
  }

  async isHealthy(): Promise<boolean> {
    return (await this.checkDatabase()) === 'ok';
  }

  private async checkDatabase(): Promise<CheckResult> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => resolve(TIMED_OUT), this.timeoutMs);
    });

    try {
      const outcome = await Promise.race([this.adapter.count(), timeout]);
      if (outcome === TIMED_OUT) {
        AppLogger.warn(`Database health check timed out after ${this.timeoutMs}ms`, 'HealthService');
        return 'timeout';
      }
      return 'ok';
    } catch (error) {
      AppLogger.error('Database health check failed', error, 'HealthService');
      return 'error';
    } finally {
      clearTimeout(timer);
    }
  }
}
