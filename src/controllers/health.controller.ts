import { Controller, Get, HttpStatus, ServiceUnavailableException } from '@nestjs/common';
import { HealthService, ReadinessStatus } from '../services/health.service';

/**
 * Liveness and readiness checks. Neither requires an API key.
 */
@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get('live')
  live(): { status: 'ok' } {
    return { status: 'ok' };
  }

  /**
   * Answers 503 with the same body when the database check does not pass.
   */
  @Get('ready')
  async ready(): Promise<ReadinessStatus> {
    const readiness = await this.healthService.checkReadiness();
    if (readiness.status !== 'ok') {
      throw new ServiceUnavailableException({
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        ...readiness,
      });
    }
    return readiness;
  }
}
