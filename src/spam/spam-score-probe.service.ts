import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { ExporterConfiguration } from '../config/config.types';
import { classifyError } from '../shared/errors';
import { getErrorMessage } from '../shared/error.utils';
import { buildProbeSubject, newCorrelationToken } from '../probe/correlation-token';
import { MAIL_CLIENT_FACTORY } from '../probe/interfaces/mail-capabilities.interface';
import type { MailClientFactory } from '../probe/interfaces/mail-capabilities.interface';
import type { ProbeStage } from '../probe/interfaces/probe-result.interface';
import { SCORE_FETCHER } from './interfaces/spam-score.interface';
import type { ScoreFetcher, SpamScoreOutcome } from './interfaces/spam-score.interface';

/**
 * Sends a message to the scoring service and reads back its score, at most once per
 * minimum interval.
 */
@Injectable()
export class SpamScoreProbeService {
  private readonly logger = new Logger(SpamScoreProbeService.name);
  private readonly config: ExporterConfiguration['spamScore'];
  private readonly sender: ExporterConfiguration['accounts']['internal'];

  /* v8 ignore next 5 - false positive on constructor parameter properties */
  constructor(
    configService: ConfigService,
    @Inject(MAIL_CLIENT_FACTORY) private readonly clientFactory: MailClientFactory,
    @Inject(SCORE_FETCHER) private readonly scoreFetcher: ScoreFetcher,
  ) {
    this.config = configService.getOrThrow<ExporterConfiguration['spamScore']>('exporter.spamScore');
    this.sender = configService.getOrThrow<ExporterConfiguration['accounts']['internal']>('exporter.accounts.internal');
  }

  get minIntervalMs(): number {
    return this.config.minIntervalSeconds * 1000;
  }

  get resultUrl(): string {
    return this.config.resultUrl;
  }

  /**
   * Runs a check unless the previous one was less than the minimum interval ago.
   * A skipped check performs no network I/O.
   *
   * @param lastCheckedAt - Epoch ms of the previous attempt, undefined if none yet
   * @param now - Epoch ms of this tick
   */
  async attempt(lastCheckedAt: number | undefined, now: number): Promise<SpamScoreOutcome> {
    if (lastCheckedAt !== undefined && now - lastCheckedAt < this.minIntervalMs) {
      const nextEligibleAt = lastCheckedAt + this.minIntervalMs;
      this.logger.log(`Spam score test doesn't need to run yet (next at ${new Date(nextEligibleAt).toISOString()})`);
      return { status: 'skipped', nextEligibleAt };
    }

    const token = newCorrelationToken(now);
    this.logger.log(`Starting spam score test with ID: ${token}`);

    try {
      this.logger.log(`Sending email to spam score test from ${this.sender.address} to ${this.config.testAddress}`);
      await this.clientFactory.createSender(this.sender).send({
        from: this.sender.address,
        to: this.config.testAddress,
        subject: buildProbeSubject(token),
        text: [
          'This is an automated deliverability test from the mail health exporter service.',
          '',
          `Test ID: ${token}`,
          `Timestamp: ${new Date(now).toISOString()}`,
        ].join('\n'),
      });
    } catch (error) {
      return this.fail('send', error);
    }

    try {
      this.logger.log(`Retrieving spam score from url ${this.config.resultUrl}`);
      const parsed = await this.scoreFetcher.fetchScore(this.config.resultUrl);
      return {
        status: 'scored',
        result: { ...parsed, sourceUrl: this.config.resultUrl, checkedAt: now },
      };
    } catch (error) {
      return this.fail('receive', error);
    }
  }

  private fail(stage: ProbeStage, error: unknown): SpamScoreOutcome {
    const failure = { stage, kind: classifyError(error), message: getErrorMessage(error) };
    this.logger.error(`Spam score test failed at ${stage} [${failure.kind}]: ${failure.message}`);
    return { status: 'failed', failure };
  }
}
