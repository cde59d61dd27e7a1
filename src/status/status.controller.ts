import { Controller, Get, Header, HttpCode, HttpStatus } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { MetricsService } from '../metrics/metrics.service';
import { StatusRenderer } from './status-renderer';

@ApiTags('Status')
@Controller('status')
export class StatusController {
  private readonly spamTestUrl: string;

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    private readonly metricsService: MetricsService,
    private readonly renderer: StatusRenderer,
    configService: ConfigService,
  ) {
    this.spamTestUrl = configService.getOrThrow<string>('exporter.spamScore.resultUrl');
  }

  /**
   * GET /status
   * Human-readable dashboard built from the current metric values.
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  @Header('Content-Type', 'text/html; charset=utf-8')
  @ApiOperation({
    summary: 'Mail Server Status Page',
    description: 'HTML page showing whether sending and receiving work and the latest spam score.',
  })
  @ApiProduces('text/html')
  @ApiResponse({ status: 200, description: 'Status page rendered successfully.' })
  getStatus(): string {
    return this.renderer.render({
      ...this.metricsService.getStatusSnapshot(),
      spamTestUrl: this.spamTestUrl,
    });
  }
}
