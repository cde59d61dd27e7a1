import { Logger } from '@nestjs/common';
import { createTransport } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { MailAccountConfig } from '../config/config.types';
import { toProbeError } from '../shared/errors';
import type { MailSender, ProbeMessage } from '../probe/interfaces/mail-capabilities.interface';

const IMPLICIT_TLS_PORT = 465;

/**
 * Builds nodemailer SMTP options for an account.
 *
 * TLS on port 465 means implicit TLS; TLS on any other port means mandatory STARTTLS;
 * no TLS means plain SMTP (port 25 relays).
 */
export function buildSmtpTransportOptions(account: MailAccountConfig, timeoutMs: number): SMTPTransport.Options {
  const implicitTls = account.smtp.useTls && account.smtp.port === IMPLICIT_TLS_PORT;
  return {
    host: account.smtp.host,
    port: account.smtp.port,
    secure: implicitTls,
    requireTLS: account.smtp.useTls && !implicitTls,
    ignoreTLS: !account.smtp.useTls,
    auth: {
      user: account.address,
      pass: account.password,
    },
    connectionTimeout: timeoutMs,
    greetingTimeout: timeoutMs,
    socketTimeout: timeoutMs,
  };
}

/**
 * {@link MailSender} backed by a short-lived nodemailer transport (one connection per send).
 */
export class SmtpMailSender implements MailSender {
  private readonly logger = new Logger(SmtpMailSender.name);

  constructor(
    private readonly account: MailAccountConfig,
    private readonly timeoutMs: number,
  ) {}

  async send(message: ProbeMessage): Promise<void> {
    const transport = createTransport(buildSmtpTransportOptions(this.account, this.timeoutMs));
    try {
      const info = await transport.sendMail({
        from: message.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        date: new Date(),
        headers: {
          'X-Mailer': 'mail-health-exporter',
          ...message.headers,
        },
      });
      this.logger.debug(`Sent ${info.messageId} via ${this.account.smtp.host}: ${info.response}`);
    } catch (error) {
      throw toProbeError(error);
    } finally {
      transport.close();
    }
  }
}
