import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { SchedulerHealthIndicator } from './scheduler.health';
import { SchedulerModule } from '../scheduler/scheduler.module';

/**
 * The HealthModule provides health check endpoints for the application.
 */
@Module({
  imports: [TerminusModule, SchedulerModule],
  controllers: [HealthController],
  providers: [SchedulerHealthIndicator],
})
export class HealthModule {}
