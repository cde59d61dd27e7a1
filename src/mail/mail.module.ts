import { Module } from '@nestjs/common';
import { MAIL_CLIENT_FACTORY } from '../probe/interfaces/mail-capabilities.interface';
import { NetworkMailClientFactory } from './mail-client.factory';

/**
 * Provides the SMTP/IMAP capabilities used by the probes.
 */
@Module({
  providers: [{ provide: MAIL_CLIENT_FACTORY, useClass: NetworkMailClientFactory }],
  exports: [MAIL_CLIENT_FACTORY],
})
export class MailModule {}
