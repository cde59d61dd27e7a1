import { Injectable } from '@nestjs/common';
import { HealthIndicatorService } from '@nestjs/terminus';
import { ProbeSchedulerService } from '../scheduler/probe-scheduler.service';

/**
 * Health indicator for the check loops.
 */
@Injectable()
export class SchedulerHealthIndicator {
  /**
   * Initializes the SchedulerHealthIndicator.
   * @param scheduler The ProbeSchedulerService.
   * @param healthIndicatorService The HealthIndicatorService.
   */
  constructor(
    private readonly scheduler: ProbeSchedulerService,
    private readonly healthIndicatorService: HealthIndicatorService,
  ) {}

  /**
   * Up while both check intervals are registered.
   * @param key The key to use for the health indicator result.
   * @returns A promise that resolves to the health indicator result.
   */
  isHealthy(key: string) {
    const running = this.scheduler.isRunning();
    const indicator = this.healthIndicatorService.check(key);

    const details = {
      running,
      roundTripInFlight: this.scheduler.isCheckInFlight('round-trip'),
      spamScoreInFlight: this.scheduler.isCheckInFlight('spam-score'),
    };

    if (running) {
      return Promise.resolve(indicator.up(details));
    }

    return Promise.resolve(indicator.down(details));
  }
}
