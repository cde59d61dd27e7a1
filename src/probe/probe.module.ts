import { Module } from '@nestjs/common';
import { MailModule } from '../mail/mail.module';
import { CLOCK, systemClock } from '../shared/clock';
import { RoundTripProbeService } from './round-trip-probe.service';

@Module({
  imports: [MailModule],
  providers: [RoundTripProbeService, { provide: CLOCK, useValue: systemClock }],
  exports: [RoundTripProbeService, CLOCK],
})
export class ProbeModule {}
