import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import appConfig from './app.config';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { ProbeModule } from './probe/probe.module';
import { SpamModule } from './spam/spam.module';
import { SchedulerModule } from './scheduler/scheduler.module';
import { StatusModule } from './status/status.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig],
    }),
    ScheduleModule.forRoot(),
    MetricsModule,
    ProbeModule,
    SpamModule,
    SchedulerModule,
    StatusModule,
    HealthModule,
  ],
})
export class AppModule {}
