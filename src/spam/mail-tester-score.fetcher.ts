import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom, timeout } from 'rxjs';
import { toProbeError } from '../shared/errors';
import type { ParsedSpamScore, ScoreFetcher } from './interfaces/spam-score.interface';
import { parseSpamScore } from './spam-score.parser';

const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Reads the score from the scoring service's HTML results page.
 */
@Injectable()
export class MailTesterScoreFetcher implements ScoreFetcher {
  private readonly logger = new Logger(MailTesterScoreFetcher.name);
  private readonly timeoutMs: number;

  /* v8 ignore next 4 - false positive on constructor parameter properties */
  constructor(
    configService: ConfigService,
    private readonly httpService: HttpService,
  ) {
    this.timeoutMs = configService.getOrThrow<number>('exporter.spamScore.fetchTimeoutSeconds') * 1000;
  }

  async fetchScore(url: string): Promise<ParsedSpamScore> {
    let html: string;
    try {
      const response = await firstValueFrom(
        this.httpService
          .get<string>(url, {
            headers: { 'User-Agent': BROWSER_USER_AGENT },
            responseType: 'text',
          })
          .pipe(timeout(this.timeoutMs)),
      );
      html = response.data;
    } catch (error) {
      throw toProbeError(error);
    }

    const parsed = parseSpamScore(html);
    this.logger.log(`Successfully parsed score: ${parsed.score}/${parsed.maxScore}`);
    return parsed;
  }
}
