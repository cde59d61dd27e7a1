import { Controller, Get, Header, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { MetricsService } from './metrics.service';
import { PROMETHEUS_CONTENT_TYPE, renderPrometheusText } from './prometheus.utils';

@ApiTags('Metrics')
@Controller('metrics')
export class MetricsController {
  /* v8 ignore next 1 - false positive on constructor parameter properties */
  constructor(private readonly metricsService: MetricsService) {}

  /**
   * GET /metrics
   * Prometheus scrape endpoint. Always answers 200 with every metric, including before the
   * first check and while probes are failing.
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', PROMETHEUS_CONTENT_TYPE)
  @ApiOperation({
    summary: 'Prometheus Metrics',
    description: 'Send/receive counters, working gauges, round-trip duration and spam score in text exposition format.',
  })
  @ApiProduces('text/plain')
  @ApiResponse({ status: 200, description: 'Metrics rendered successfully.' })
  getMetrics(): string {
    return renderPrometheusText(this.metricsService.snapshot());
  }
}
