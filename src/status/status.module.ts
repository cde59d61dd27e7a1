import { Module } from '@nestjs/common';
import { MetricsModule } from '../metrics/metrics.module';
import { StatusController } from './status.controller';
import { StatusRenderer, TemplateStatusRenderer } from './status-renderer';

@Module({
  imports: [MetricsModule],
  controllers: [StatusController],
  providers: [{ provide: StatusRenderer, useClass: TemplateStatusRenderer }],
})
export class StatusModule {}
