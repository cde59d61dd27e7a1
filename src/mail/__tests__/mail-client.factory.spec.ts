import { NetworkMailClientFactory } from '../mail-client.factory';
import { SmtpMailSender } from '../smtp-mail-sender';
import { ImapMailbox } from '../imap-mailbox';
import { buildTestConfig, createConfigService } from '../../../test/helpers/test-config';

describe('NetworkMailClientFactory', () => {
  const config = buildTestConfig();
  const factory = new NetworkMailClientFactory(createConfigService(config));

  it('should create an SMTP sender', () => {
    expect(factory.createSender(config.accounts.internal)).toBeInstanceOf(SmtpMailSender);
  });

  it('should create an IMAP mailbox', () => {
    expect(factory.createMailbox(config.accounts.external)).toBeInstanceOf(ImapMailbox);
  });
});
