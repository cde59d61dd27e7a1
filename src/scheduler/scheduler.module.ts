import { Module } from '@nestjs/common';
import { MetricsModule } from '../metrics/metrics.module';
import { ProbeModule } from '../probe/probe.module';
import { SpamModule } from '../spam/spam.module';
import { ProbeSchedulerService } from './probe-scheduler.service';

/**
 * Owns the two check loops. Relies on `ScheduleModule.forRoot()` for the SchedulerRegistry.
 */
@Module({
  imports: [ProbeModule, SpamModule, MetricsModule],
  providers: [ProbeSchedulerService],
  exports: [ProbeSchedulerService],
})
export class SchedulerModule {}
