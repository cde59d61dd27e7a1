import { Inject, Injectable } from '@nestjs/common';
import { CLOCK, toUnixSeconds } from '../shared/clock';
import type { Clock } from '../shared/clock';
import { GAUGE_TIMESTAMPS, METRIC_DEFINITIONS, METRIC_NAMES } from './metrics.constants';
import type { CounterName, MetricName, TimestampedGaugeName } from './metrics.constants';
import type { MetricSample, MetricsUpdate, StatusSnapshot } from './interfaces';

/**
 * @class MetricsService
 * @description Single in-memory registry for every exported metric. The scheduler writes to it,
 * the HTTP handlers read from it. Each method runs synchronously to completion, so a reader can
 * never observe a counter mid-increment or a gauge without its matching timestamp.
 */
@Injectable()
export class MetricsService {
  /** Current value per metric, keyed in exposition order */
  private readonly values = new Map<MetricName, number>();

  constructor(@Inject(CLOCK) clock: Clock) {
    const startedAt = toUnixSeconds(clock.now());
    for (const definition of METRIC_DEFINITIONS) {
      this.values.set(definition.name, definition.initial === 'startup' ? startedAt : definition.initial);
    }
  }

  /**
   * Adds one to a counter.
   */
  increment(name: CounterName): void {
    this.values.set(name, this.read(name) + 1);
  }

  /**
   * Replaces a gauge and its "last checked" timestamp together.
   * @param {TimestampedGaugeName} name - Gauge with an associated timestamp gauge.
   * @param {number} value - New gauge value.
   * @param {number} checkedAt - Epoch milliseconds of the check that produced the value.
   */
  setGauge(name: TimestampedGaugeName, value: number, checkedAt: number): void {
    this.values.set(name, value);
    this.values.set(GAUGE_TIMESTAMPS[name], toUnixSeconds(checkedAt));
  }

  /**
   * Applies a batch of counter increments and gauge replacements as one unit.
   */
  apply(update: MetricsUpdate): void {
    for (const name of update.increments ?? []) {
      this.increment(name);
    }
    for (const definition of METRIC_DEFINITIONS) {
      if (definition.type !== 'gauge') {
        continue;
      }
      const value = update.gauges?.[definition.name];
      if (value !== undefined) {
        this.values.set(definition.name, value);
      }
    }
  }

  /**
   * Current value of a single metric.
   */
  get(name: MetricName): number {
    return this.read(name);
  }

  /**
   * Point-in-time copy of every metric in exposition order.
   */
  snapshot(): MetricSample[] {
    return METRIC_DEFINITIONS.map((definition) => ({
      name: definition.name,
      type: definition.type,
      help: definition.help,
      value: this.read(definition.name),
    }));
  }

  /**
   * Values shown on the status page.
   */
  getStatusSnapshot(): StatusSnapshot {
    const lastRoundTrip = this.read(METRIC_NAMES.LAST_SEND_RECEIVE_CHECK);
    return {
      sendingWorks: this.read(METRIC_NAMES.SENDING_WORKING) === 1,
      receivingWorks: this.read(METRIC_NAMES.RECEIVING_WORKING) === 1,
      spamScore: this.read(METRIC_NAMES.SPAM_SCORE),
      lastUpdated: {
        sending: lastRoundTrip,
        receiving: lastRoundTrip,
        spam: this.read(METRIC_NAMES.LAST_SPAM_SCORE_CHECK),
      },
    };
  }

  private read(name: MetricName): number {
    return this.values.get(name) ?? 0;
  }
}
