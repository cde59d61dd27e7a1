import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { MailModule } from '../mail/mail.module';
import { SCORE_FETCHER } from './interfaces/spam-score.interface';
import { MailTesterScoreFetcher } from './mail-tester-score.fetcher';
import { SpamScoreProbeService } from './spam-score-probe.service';

@Module({
  imports: [HttpModule, MailModule],
  providers: [SpamScoreProbeService, { provide: SCORE_FETCHER, useClass: MailTesterScoreFetcher }],
  exports: [SpamScoreProbeService],
})
export class SpamModule {}
