import type { CounterName, GaugeName, MetricName, MetricType } from './metrics.constants';

/**
 * One metric value as read by {@link MetricsService.snapshot}.
 */
export interface MetricSample {
  name: MetricName;
  type: MetricType;
  help: string;
  value: number;
}

/**
 * A batch of changes applied as one unit.
 */
export interface MetricsUpdate {
  increments?: CounterName[];
  gauges?: Partial<Record<GaugeName, number>>;
}

/**
 * Values the status page needs, with timestamps in Unix seconds.
 */
export interface StatusSnapshot {
  sendingWorks: boolean;
  receivingWorks: boolean;
  spamScore: number;
  lastUpdated: {
    sending: number;
    receiving: number;
    spam: number;
  };
}
