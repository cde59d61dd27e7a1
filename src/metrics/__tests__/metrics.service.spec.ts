import { MetricsService } from '../metrics.service';
import { METRIC_DEFINITIONS, METRIC_NAMES } from '../metrics.constants';
import { FakeClock, FAKE_CLOCK_START } from '../../../test/helpers/fake-clock';

const START_SECONDS = FAKE_CLOCK_START / 1000;

describe('MetricsService', () => {
  let service: MetricsService;

  beforeEach(() => {
    service = new MetricsService(new FakeClock());
  });

  describe('initial values', () => {
    it('should start counters and the duration and spam score at zero', () => {
      expect(service.get(METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS)).toBe(0);
      expect(service.get(METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_FAILURES)).toBe(0);
      expect(service.get(METRIC_NAMES.ROUNDTRIP_DURATION_SECONDS)).toBe(0);
      expect(service.get(METRIC_NAMES.SPAM_SCORE)).toBe(0);
    });

    it('should start the working gauges at 1 and timestamps at startup', () => {
      expect(service.get(METRIC_NAMES.SENDING_WORKING)).toBe(1);
      expect(service.get(METRIC_NAMES.RECEIVING_WORKING)).toBe(1);
      expect(service.get(METRIC_NAMES.LAST_SEND_RECEIVE_CHECK)).toBe(START_SECONDS);
      expect(service.get(METRIC_NAMES.LAST_SPAM_SCORE_CHECK)).toBe(START_SECONDS);
    });
  });

  describe('increment', () => {
    it('should add one to a counter per call', () => {
      service.increment(METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS);
      service.increment(METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS);
      service.increment(METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS);

      expect(service.get(METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS)).toBe(3);
    });

    it('should offer no setter that could move a gauge without its timestamp', () => {
      expect('set' in service).toBe(false);
    });
  });

  describe('gauges', () => {
    it('should replace a gauge value', () => {
      service.apply({ gauges: { [METRIC_NAMES.ROUNDTRIP_DURATION_SECONDS]: 4.2 } });

      expect(service.get(METRIC_NAMES.ROUNDTRIP_DURATION_SECONDS)).toBe(4.2);
    });

    it('should move a gauge and its timestamp together', () => {
      service.setGauge(METRIC_NAMES.SPAM_SCORE, 8, FAKE_CLOCK_START + 1500);

      expect(service.get(METRIC_NAMES.SPAM_SCORE)).toBe(8);
      expect(service.get(METRIC_NAMES.LAST_SPAM_SCORE_CHECK)).toBe(START_SECONDS + 1.5);
      expect(service.get(METRIC_NAMES.LAST_SEND_RECEIVE_CHECK)).toBe(START_SECONDS);
    });
  });

  describe('apply', () => {
    it('should apply increments and gauges in one call', () => {
      service.apply({
        increments: [
          METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_SUCCESS,
          METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_SUCCESS,
          METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_FAILURES,
        ],
        gauges: {
          [METRIC_NAMES.SENDING_WORKING]: 0,
          [METRIC_NAMES.LAST_SEND_RECEIVE_CHECK]: START_SECONDS + 60,
        },
      });

      expect(service.get(METRIC_NAMES.SEND_EXTERNAL_TO_INTERNAL_SUCCESS)).toBe(2);
      expect(service.get(METRIC_NAMES.RECEIVE_EXTERNAL_TO_INTERNAL_FAILURES)).toBe(1);
      expect(service.get(METRIC_NAMES.SENDING_WORKING)).toBe(0);
      expect(service.get(METRIC_NAMES.RECEIVING_WORKING)).toBe(1);
      expect(service.get(METRIC_NAMES.LAST_SEND_RECEIVE_CHECK)).toBe(START_SECONDS + 60);
    });

    it('should accept an empty update', () => {
      const before = service.snapshot();

      service.apply({});

      expect(service.snapshot()).toEqual(before);
    });
  });

  describe('snapshot', () => {
    it('should list every metric in exposition order', () => {
      expect(service.snapshot().map((sample) => sample.name)).toEqual(
        METRIC_DEFINITIONS.map((definition) => definition.name),
      );
      expect(service.snapshot()).toHaveLength(14);
    });

    it('should carry type and help text', () => {
      expect(service.snapshot()[0]).toEqual({
        name: 'mail_health_exporter__send_internal_to_external_success_total',
        type: 'counter',
        help: 'Total successful mail sends from internal to external',
        value: 0,
      });
    });

    it('should be a copy that later updates do not change', () => {
      const before = service.snapshot();

      service.increment(METRIC_NAMES.SEND_INTERNAL_TO_EXTERNAL_SUCCESS);

      expect(before[0].value).toBe(0);
    });
  });

  describe('getStatusSnapshot', () => {
    it('should derive the status page values', () => {
      service.apply({ gauges: { [METRIC_NAMES.RECEIVING_WORKING]: 0 } });
      service.setGauge(METRIC_NAMES.SPAM_SCORE, 9.1, FAKE_CLOCK_START + 2000);

      expect(service.getStatusSnapshot()).toEqual({
        sendingWorks: true,
        receivingWorks: false,
        spamScore: 9.1,
        lastUpdated: {
          sending: START_SECONDS,
          receiving: START_SECONDS,
          spam: START_SECONDS + 2,
        },
      });
    });
  });
});
