import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { MailAccountConfig } from '../config/config.types';
import type { MailClientFactory, Mailbox, MailSender } from '../probe/interfaces/mail-capabilities.interface';
import { SmtpMailSender } from './smtp-mail-sender';
import { ImapMailbox } from './imap-mailbox';

/**
 * Creates nodemailer senders and imapflow mailboxes, with socket timeouts bounded by the
 * round-trip poll window.
 */
@Injectable()
export class NetworkMailClientFactory implements MailClientFactory {
  private readonly timeoutMs: number;

  constructor(configService: ConfigService) {
    this.timeoutMs = configService.getOrThrow<number>('exporter.roundTrip.timeoutSeconds') * 1000;
  }

  createSender(account: MailAccountConfig): MailSender {
    return new SmtpMailSender(account, this.timeoutMs);
  }

  createMailbox(account: MailAccountConfig): Mailbox {
    return new ImapMailbox(account, this.timeoutMs);
  }
}
