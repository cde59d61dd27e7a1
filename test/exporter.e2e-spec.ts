import request from 'supertest';
import { useTestAppLifecycle, E2E_SPAM_SCORE } from './helpers/test-app';
import { EXTERNAL_ADDRESS, INTERNAL_ADDRESS, SPAM_RESULT_URL, SPAM_TEST_ADDRESS } from './helpers/test-config';
import { FAKE_CLOCK_START } from './helpers/fake-clock';

const METRIC_NAMES = [
  'mail_health_exporter__send_internal_to_external_success_total',
  'mail_health_exporter__send_internal_to_external_failures_total',
  'mail_health_exporter__receive_internal_to_external_success_total',
  'mail_health_exporter__receive_internal_to_external_failures_total',
  'mail_health_exporter__send_external_to_internal_success_total',
  'mail_health_exporter__send_external_to_internal_failures_total',
  'mail_health_exporter__receive_external_to_internal_success_total',
  'mail_health_exporter__receive_external_to_internal_failures_total',
  'mail_health_exporter__sending_mails_working',
  'mail_health_exporter__receiving_mails_working',
  'mail_health_exporter__roundtrip_duration_seconds',
  'mail_health_exporter__last_send_receive_check_timestamp',
  'mail_health_exporter__spam_score',
  'mail_health_exporter__last_spam_score_check_timestamp',
];

describe('Exporter E2E', () => {
  const appLifecycle = useTestAppLifecycle();

  describe('startup checks', () => {
    it('should have sent one probe per direction and one spam score message', () => {
      const recipients = appLifecycle.mailServer.sent.map((message) => message.to).sort();

      expect(recipients).toEqual([SPAM_TEST_ADDRESS, EXTERNAL_ADDRESS, INTERNAL_ADDRESS].sort());
    });
  });

  describe('GET /metrics', () => {
    it('should expose every metric in the text format', async () => {
      const response = await request(appLifecycle.httpServer).get('/metrics').expect(200);

      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.headers['content-type']).toContain('version=0.0.4');

      const lines = response.text.split('\n');
      for (const name of METRIC_NAMES) {
        expect(lines.some((line) => line.startsWith(`${name} `))).toBe(true);
      }
    });

    it('should report the results of the startup checks', async () => {
      const response = await request(appLifecycle.httpServer).get('/metrics').expect(200);
      const lines = response.text.split('\n');

      expect(lines).toContain('mail_health_exporter__send_internal_to_external_success_total 1');
      expect(lines).toContain('mail_health_exporter__receive_external_to_internal_success_total 1');
      expect(lines).toContain('mail_health_exporter__send_internal_to_external_failures_total 0');
      expect(lines).toContain('mail_health_exporter__sending_mails_working 1');
      expect(lines).toContain('mail_health_exporter__receiving_mails_working 1');
      expect(lines).toContain(`mail_health_exporter__spam_score ${E2E_SPAM_SCORE.score}`);
      expect(lines).toContain(`mail_health_exporter__last_spam_score_check_timestamp ${FAKE_CLOCK_START / 1000}`);
    });
  });

  describe('GET /status', () => {
    it('should render the status page with current values', async () => {
      const response = await request(appLifecycle.httpServer).get('/status').expect(200);

      expect(response.headers['content-type']).toMatch(/^text\/html/);
      expect(response.text).toContain('<title>Mail Server Status</title>');
      expect(response.text).toContain('"sendingWorks": true,');
      expect(response.text).toContain('"receivingWorks": true,');
      expect(response.text).toContain(`"spamScore": ${E2E_SPAM_SCORE.score},`);
      expect(response.text).toContain(`"spamTestUrl": "${SPAM_RESULT_URL}"`);
    });
  });

  describe('GET /health', () => {
    it('should report the scheduler as running', async () => {
      const response = await request(appLifecycle.httpServer).get('/health').expect(200);

      expect(response.body).toMatchObject({
        status: 'ok',
        info: {
          server: { status: 'up' },
          scheduler: { status: 'up', running: true, roundTripInFlight: false, spamScoreInFlight: false },
        },
      });
    });
  });

  it('should answer unknown paths with 404', async () => {
    await request(appLifecycle.httpServer).get('/unknown').expect(404);
  });
});
