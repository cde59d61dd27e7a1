import { BeforeApplicationShutdown, Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { CLOCK } from '../shared/clock';
import type { Clock } from '../shared/clock';
import { getErrorMessage } from '../shared/error.utils';
import type { ExporterConfiguration } from '../config/config.types';
import { MetricsService } from '../metrics/metrics.service';
import { METRIC_NAMES } from '../metrics/metrics.constants';
import { RoundTripProbeService } from '../probe/round-trip-probe.service';
import { SpamScoreProbeService } from '../spam/spam-score-probe.service';
import { failedRoundTrip, roundTripUpdate } from './metric-updates';

export type CheckKind = 'round-trip' | 'spam-score';

export const SCHEDULER_JOBS: Record<CheckKind, string> = {
  'round-trip': 'round-trip-check',
  'spam-score': 'spam-score-check',
};

/**
 * Runs the round-trip and spam-score checks on two independent intervals.
 *
 * - A tick that fires while the previous run of the same check is still in flight is
 *   skipped; the check runs again at its next regular interval.
 * - Errors escaping a probe are caught here and recorded as failures; they never stop a loop.
 * - On shutdown no new ticks start and in-flight checks are awaited until they end on their
 *   own timeouts.
 */
@Injectable()
export class ProbeSchedulerService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly logger = new Logger(ProbeSchedulerService.name);
  private readonly inFlight = new Map<CheckKind, Promise<void>>();
  private readonly intervalsMs: Record<CheckKind, number>;
  /** Epoch ms of the last spam-score attempt that was not skipped */
  private lastSpamAttemptAt: number | undefined;

  /* v8 ignore next 8 - false positive on constructor parameter properties */
  constructor(
    configService: ConfigService,
    private readonly roundTripProbe: RoundTripProbeService,
    private readonly spamScoreProbe: SpamScoreProbeService,
    private readonly metricsService: MetricsService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    const config = configService.getOrThrow<ExporterConfiguration>('exporter');
    this.intervalsMs = {
      'round-trip': config.roundTrip.checkIntervalSeconds * 1000,
      'spam-score': config.spamScore.checkIntervalSeconds * 1000,
    };
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    this.stop();
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} in-flight check(s) before shutdown${signal ? ` (${signal})` : ''}`);
    }
    await this.waitForIdle();
  }

  /**
   * Registers both intervals and runs each check once right away.
   */
  start(): void {
    this.register('round-trip', () => this.runRoundTripCheck());
    this.register('spam-score', () => this.runSpamScoreCheck());
    void this.runRoundTripCheck();
    void this.runSpamScoreCheck();
  }

  stop(): void {
    for (const [kind, name] of Object.entries(SCHEDULER_JOBS)) {
      if (this.schedulerRegistry.doesExist('interval', name)) {
        this.schedulerRegistry.deleteInterval(name);
        this.logger.log(`Stopped ${kind} check`);
      }
    }
  }

  /**
   * True while both intervals are registered.
   */
  isRunning(): boolean {
    return Object.values(SCHEDULER_JOBS).every((name) => this.schedulerRegistry.doesExist('interval', name));
  }

  isCheckInFlight(kind: CheckKind): boolean {
    return this.inFlight.has(kind);
  }

  async waitForIdle(): Promise<void> {
    await Promise.all(this.inFlight.values());
  }

  runRoundTripCheck(): Promise<void> {
    return this.trigger('round-trip', () => this.roundTripTick(), (error, startedAt) => {
      this.metricsService.apply(roundTripUpdate(failedRoundTrip(error, startedAt, this.clock.now())));
    });
  }

  runSpamScoreCheck(): Promise<void> {
    return this.trigger('spam-score', (startedAt) => this.spamScoreTick(startedAt), (_error, startedAt) => {
      // The previous score and timestamp stay as they are
      this.lastSpamAttemptAt = startedAt;
    });
  }

  private register(kind: CheckKind, tick: () => Promise<void>): void {
    const name = SCHEDULER_JOBS[kind];
    if (this.schedulerRegistry.doesExist('interval', name)) {
      return;
    }
    const interval = setInterval(() => {
      void tick();
    }, this.intervalsMs[kind]);
    this.schedulerRegistry.addInterval(name, interval);
    this.logger.log(`Scheduled ${kind} check every ${this.intervalsMs[kind] / 1000}s`);
  }

  private trigger(
    kind: CheckKind,
    tick: (startedAt: number) => Promise<void>,
    onError: (error: unknown, startedAt: number) => void,
  ): Promise<void> {
    const running = this.inFlight.get(kind);
    if (running) {
      this.logger.warn(`Previous ${kind} check is still running; skipping this tick`);
      return running;
    }

    const startedAt = this.clock.now();
    const run = tick(startedAt)
      .catch((error: unknown) => {
        this.logger.error(`Unexpected error in ${kind} check: ${getErrorMessage(error)}`);
        onError(error, startedAt);
      })
      .finally(() => {
        this.inFlight.delete(kind);
      });
    this.inFlight.set(kind, run);
    return run;
  }

  private async roundTripTick(): Promise<void> {
    const result = await this.roundTripProbe.run();
    this.metricsService.apply(roundTripUpdate(result));
  }

  private async spamScoreTick(now: number): Promise<void> {
    const outcome = await this.spamScoreProbe.attempt(this.lastSpamAttemptAt, now);
    if (outcome.status === 'skipped') {
      return;
    }

    this.lastSpamAttemptAt = now;
    if (outcome.status === 'scored') {
      this.metricsService.setGauge(METRIC_NAMES.SPAM_SCORE, outcome.result.score, outcome.result.checkedAt);
      this.logger.log(`Spam score ${outcome.result.score} recorded`);
    }
  }
}
