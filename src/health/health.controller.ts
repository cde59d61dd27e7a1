import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { SchedulerHealthIndicator } from './scheduler.health';
import { HealthResponseDto } from './dto/health-response.dto';

/**
 * Liveness of the exporter itself. Says nothing about the mail servers; that is what
 * /metrics is for.
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  /**
   * Initializes the HealthController.
   * @param health The HealthCheckService.
   * @param scheduler The SchedulerHealthIndicator.
   */
  constructor(
    private readonly health: HealthCheckService,
    private readonly scheduler: SchedulerHealthIndicator,
  ) {}

  /**
   * Performs a health check.
   * @returns A promise that resolves to the health check result.
   */
  @Get()
  @HealthCheck()
  @ApiOperation({
    summary: 'Get Exporter Health Status',
    description: 'Reports whether the HTTP server is up and both check loops are scheduled.',
  })
  @ApiResponse({
    status: 200,
    description: 'The exporter is healthy. See the response body for detailed status of each component.',
    type: HealthResponseDto,
  })
  @ApiResponse({
    status: 503,
    description: 'The exporter is unhealthy. One or more health checks failed.',
    type: HealthResponseDto,
  })
  check() {
    return this.health.check([
      () => Promise.resolve({ server: { status: 'up' } }),
      () => this.scheduler.isHealthy('scheduler'),
    ]);
  }
}
