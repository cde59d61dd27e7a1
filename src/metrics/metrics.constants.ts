export const METRIC_PREFIX = 'mail_health_exporter__';

export const METRIC_NAMES = {
  // Sending
  SEND_INTERNAL_TO_EXTERNAL_SUCCESS: 'mail_health_exporter__send_internal_to_external_success_total',
  SEND_INTERNAL_TO_EXTERNAL_FAILURES: 'mail_health_exporter__send_internal_to_external_failures_total',
  SEND_EXTERNAL_TO_INTERNAL_SUCCESS: 'mail_health_exporter__send_external_to_internal_success_total',
  SEND_EXTERNAL_TO_INTERNAL_FAILURES: 'mail_health_exporter__send_external_to_internal_failures_total',

  // Receiving
  RECEIVE_INTERNAL_TO_EXTERNAL_SUCCESS: 'mail_health_exporter__receive_internal_to_external_success_total',
  RECEIVE_INTERNAL_TO_EXTERNAL_FAILURES: 'mail_health_exporter__receive_internal_to_external_failures_total',
  RECEIVE_EXTERNAL_TO_INTERNAL_SUCCESS: 'mail_health_exporter__receive_external_to_internal_success_total',
  RECEIVE_EXTERNAL_TO_INTERNAL_FAILURES: 'mail_health_exporter__receive_external_to_internal_failures_total',

  // Round trip
  SENDING_WORKING: 'mail_health_exporter__sending_mails_working',
  RECEIVING_WORKING: 'mail_health_exporter__receiving_mails_working',
  ROUNDTRIP_DURATION_SECONDS: 'mail_health_exporter__roundtrip_duration_seconds',
  LAST_SEND_RECEIVE_CHECK: 'mail_health_exporter__last_send_receive_check_timestamp',

  // Spam score
  SPAM_SCORE: 'mail_health_exporter__spam_score',
  LAST_SPAM_SCORE_CHECK: 'mail_health_exporter__last_spam_score_check_timestamp',
} as const;

export type MetricName = (typeof METRIC_NAMES)[keyof typeof METRIC_NAMES];

export type MetricType = 'counter' | 'gauge';

export interface MetricDefinition {
  name: MetricName;
  type: MetricType;
  help: string;
  /** Value before any check has completed; `'startup'` means the process start time */
  initial: number | 'startup';
}

/**
 * Every exported metric, in exposition order.
 */
export const METRIC_DEFINITIONS = [
  {
    name: METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS,
    type: 'counter',
    help: 'Total successful mail sends from internal to external',
    initial: 0,
  },
  {
    name: METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_FAILURES,
    type: 'counter',
    help: 'Total failed mail sends from internal to external',
    initial: 0,
  },
  {
    name: METRIC_NAMES.RECEIVE_INTERNAL_TO_EXTERNAL_SUCCESS,
    type: 'counter',
    help: 'Total successful mail receives from internal to external',
    initial: 0,
  },
  {
    name: METRIC_NAMES.RECEIVE_INTERNAL_TO_EXTERNAL_FAILURES,
    type: 'counter',
    help: 'Total failed mail receives from internal to external',
    initial: 0,
  },
  {
    name: METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_SUCCESS,
    type: 'counter',
    help: 'Total successful mail sends from external to internal',
    initial: 0,
  },
  {
    name: METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_FAILURES,
    type: 'counter',
    help: 'Total failed mail sends from external to internal',
    initial: 0,
  },
  {
    name: METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_SUCCESS,
    type: 'counter',
    help: 'Total successful mail receives from external to internal',
    initial: 0,
  },
  {
    name: METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_FAILURES,
    type: 'counter',
    help: 'Total failed mail receives from external to internal',
    initial: 0,
  },
  {
    name: METRIC_NAMES.SENDING_WORKING,
    type: 'gauge',
    help: 'Status whether the server is able to send mails or not',
    initial: 1,
  },
  {
    name: METRIC_NAMES.RECEIVING_WORKING,
    type: 'gauge',
    help: 'Status whether the server is able to receive mails or not',
    initial: 1,
  },
  {
    name: METRIC_NAMES.ROUNDTRIP_DURATION_SECONDS,
    type: 'gauge',
    help: 'Duration of last full internal->external->internal mail roundtrip',
    initial: 0,
  },
  {
    name: METRIC_NAMES.LAST_SEND_RECEIVE_CHECK,
    type: 'gauge',
    help: 'Timestamp of last send-receive check',
    initial: 'startup',
  },
  {
    name: METRIC_NAMES.SPAM_SCORE,
    type: 'gauge',
    help: 'Spam score of send mails',
    initial: 0,
  },
  {
    name: METRIC_NAMES.LAST_SPAM_SCORE_CHECK,
    type: 'gauge',
    help: 'Timestamp of last spam-score check',
    initial: 'startup',
  },
] as const satisfies readonly MetricDefinition[];

type Definition = (typeof METRIC_DEFINITIONS)[number];

export type CounterName = Extract<Definition, { type: 'counter' }>['name'];
export type GaugeName = Extract<Definition, { type: 'gauge' }>['name'];

/**
 * Gauges that carry a "last checked" timestamp, and the timestamp gauge they move with.
 */
export const GAUGE_TIMESTAMPS = {
  [METRIC_NAMES.SENDING_WORKING]: METRIC_NAMES.LAST_SEND_RECEIVE_CHECK,
  [METRIC_NAMES.RECEIVING_WORKING]: METRIC_NAMES.LAST_SEND_RECEIVE_CHECK,
  [METRIC_NAMES.ROUNDTRIP_DURATION_SECONDS]: METRIC_NAMES.LAST_SEND_RECEIVE_CHECK,
  [METRIC_NAMES.SPAM_SCORE]: METRIC_NAMES.LAST_SPAM_SCORE_CHECK,
} as const;

export type TimestampedGaugeName = keyof typeof GAUGE_TIMESTAMPS;
