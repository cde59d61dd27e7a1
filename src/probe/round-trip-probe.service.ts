import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CLOCK } from '../shared/clock';
import type { Clock } from '../shared/clock';
import { TimeoutError, classifyError } from '../shared/errors';
import { getErrorMessage } from '../shared/error.utils';
import type { ExporterConfiguration, MailAccountConfig } from '../config/config.types';
import { buildProbeSubject, newCorrelationToken } from './correlation-token';
import { pollUntil } from './poll.utils';
import type { PollResult } from './poll.utils';
import { MAIL_CLIENT_FACTORY } from './interfaces/mail-capabilities.interface';
import type { MailClientFactory, MailboxMatch, ProbeMessage } from './interfaces/mail-capabilities.interface';
import { PROBE_DIRECTIONS } from './interfaces/probe-result.interface';
import type {
  ProbeAttempt,
  ProbeDirection,
  ProbeFailure,
  ProbeStage,
  RoundTripResult,
} from './interfaces/probe-result.interface';

/**
 * Drives the send → poll → delete cycle between the internal and the external account.
 *
 * Each direction runs as `INIT → SENT → POLLING → (MATCHED → CLEANUP | TIMED_OUT) → DONE`.
 * Errors never escape a direction: they are returned as a failed {@link ProbeAttempt},
 * so the second direction always gets its attempt.
 */
@Injectable()
export class RoundTripProbeService {
  private readonly logger = new Logger(RoundTripProbeService.name);
  private readonly accounts: ExporterConfiguration['accounts'];
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    configService: ConfigService,
    @Inject(MAIL_CLIENT_FACTORY) private readonly clientFactory: MailClientFactory,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.accounts = configService.getOrThrow<ExporterConfiguration['accounts']>('exporter.accounts');
    const roundTrip = configService.getOrThrow<ExporterConfiguration['roundTrip']>('exporter.roundTrip');
    this.timeoutMs = roundTrip.timeoutSeconds * 1000;
    this.pollIntervalMs = roundTrip.pollIntervalSeconds * 1000;
  }

  /**
   * Runs both directions one after the other.
   */
  async run(): Promise<RoundTripResult> {
    const attempts: Record<ProbeDirection, ProbeAttempt> = {
      internal_to_external: await this.probe('internal_to_external'),
      external_to_internal: await this.probe('external_to_internal'),
    };

    const totalDurationMs = PROBE_DIRECTIONS.reduce((sum, direction) => sum + attempts[direction].durationMs, 0);
    this.logger.log(`Round trip completed in ${(totalDurationMs / 1000).toFixed(2)}s`);

    return { attempts, totalDurationMs, completedAt: this.clock.now() };
  }

  /**
   * Runs a single direction.
   */
  async probe(direction: ProbeDirection): Promise<ProbeAttempt> {
    const { sender, receiver } = this.resolveAccounts(direction);
    const token = newCorrelationToken(this.clock.now());
    const subject = buildProbeSubject(token);
    const startedAt = this.clock.now();

    this.logger.log(`Starting mail test (${this.describe(direction)}) with ID: ${token}`);

    const attempt: ProbeAttempt = {
      direction,
      token,
      startedAt,
      sent: false,
      received: false,
      durationMs: 0,
    };

    try {
      await this.clientFactory.createSender(sender).send(this.buildMessage(sender.address, receiver.address, token));
      attempt.sent = true;
      this.logger.debug(`Test email ${token} handed to ${sender.smtp.host}`);
    } catch (error) {
      return this.fail(attempt, 'send', error);
    }

    const mailbox = this.clientFactory.createMailbox(receiver);
    let poll: PollResult<MailboxMatch[]>;
    try {
      poll = await pollUntil<MailboxMatch[]>(
        async () => {
          const matches = await mailbox.findMessages({ from: sender.address, subjectContains: subject });
          const own = matches.filter((match) => match.subject.includes(token));
          return own.length > 0 ? own : undefined;
        },
        {
          intervalMs: this.pollIntervalMs,
          timeoutMs: this.timeoutMs,
          clock: this.clock,
          isFatal: (error) => classifyError(error) === 'authentication',
        },
      );
    } catch (error) {
      return this.fail(attempt, 'receive', error);
    }

    if (poll.status === 'timed_out') {
      if (poll.lastError !== undefined) {
        return this.fail(attempt, 'receive', poll.lastError);
      }
      return this.fail(
        attempt,
        'receive',
        new TimeoutError(this.timeoutMs, `Test email not found within ${this.timeoutMs / 1000} seconds`),
      );
    }

    attempt.received = true;
    attempt.durationMs = this.clock.now() - startedAt;

    try {
      await mailbox.deleteMessages(poll.value);
      this.logger.log(`Successfully received and deleted test email: ${token}`);
    } catch (error) {
      attempt.cleanupError = getErrorMessage(error);
      this.logger.warn(`Received test email ${token} but could not delete it: ${attempt.cleanupError}`);
    }

    return attempt;
  }

  private fail(attempt: ProbeAttempt, stage: ProbeStage, error: unknown): ProbeAttempt {
    const failure: ProbeFailure = { stage, kind: classifyError(error), message: getErrorMessage(error) };
    attempt.failure = failure;
    attempt.durationMs = this.clock.now() - attempt.startedAt;
    this.logger.error(
      `Mail test (${this.describe(attempt.direction)}) ${attempt.token} failed at ${stage} [${failure.kind}]: ${failure.message}`,
    );
    return attempt;
  }

  private resolveAccounts(direction: ProbeDirection): { sender: MailAccountConfig; receiver: MailAccountConfig } {
    return direction === 'internal_to_external'
      ? { sender: this.accounts.internal, receiver: this.accounts.external }
      : { sender: this.accounts.external, receiver: this.accounts.internal };
  }

  private buildMessage(from: string, to: string, token: string): ProbeMessage {
    const timestamp = new Date(this.clock.now()).toISOString();
    return {
      from,
      to,
      subject: buildProbeSubject(token),
      text: [
        'This is an automated test email from the mail health exporter service.',
        '',
        `Test ID: ${token}`,
        `Timestamp: ${timestamp}`,
        '',
        'This email should be automatically processed and deleted.',
      ].join('\n'),
      headers: {
        'X-Mail-Health-Token': token,
      },
    };
  }

  private describe(direction: ProbeDirection): string {
    return direction === 'internal_to_external' ? 'Internal -> External' : 'External -> Internal';
  }
}
